import { Body, Controller, Get, Param, ParseUUIDPipe, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CourseService } from './course.service';
import { CreateCourseDto } from './dto/create-course.dto';

@ApiTags('Courses')
@Controller('courses')
export class CourseController {
  constructor(private readonly courseService: CourseService) {}

  @Post()
  @ApiOperation({ summary: 'Create a course' })
  @ApiResponse({ status: 201, description: 'Course created' })
  @ApiResponse({ status: 409, description: 'Course code already exists' })
  create(@Body() dto: CreateCourseDto) {
    return this.courseService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List active courses' })
  findActive() {
    return this.courseService.findActive();
  }

  @Get(':id/seats')
  @ApiOperation({ summary: 'Seat availability for admission' })
  seats(@Param('id', ParseUUIDPipe) id: string) {
    return this.courseService.getSeatAvailability(id);
  }
}
