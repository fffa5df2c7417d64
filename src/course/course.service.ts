import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { Course } from './entities/course.entity';
import { CreateCourseDto } from './dto/create-course.dto';
import { Student } from '../student/entities/student.entity';

export interface SeatAvailability {
  courseId: string;
  totalSeats: number;
  enrolled: number;
  available: number;
  acceptingApplications: boolean;
}

@Injectable()
export class CourseService {
  constructor(
    @InjectRepository(Course)
    private readonly courseRepository: Repository<Course>,
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
  ) {}

  async create(dto: CreateCourseDto): Promise<Course> {
    const existing = await this.courseRepository.findOne({ where: { courseCode: dto.courseCode } });
    if (existing) {
      throw new ConflictException(`Course code ${dto.courseCode} already exists`);
    }
    const course = this.courseRepository.create({
      ...dto,
      description: dto.description ?? null,
    });
    return this.courseRepository.save(course);
  }

  async findActive(): Promise<Course[]> {
    return this.courseRepository.find({ where: { isActive: true }, order: { courseCode: 'ASC' } });
  }

  async findOne(id: string): Promise<Course> {
    const course = await this.courseRepository.findOne({ where: { id } });
    if (!course) throw new NotFoundException('Course not found');
    return course;
  }

  /**
   * Seats left for admission. Counted inside the caller's transaction when a
   * manager is given so an approval sees its own writes.
   */
  async getAvailableSeats(course: Course, manager?: EntityManager): Promise<number> {
    const enrolled = manager
      ? await manager.count(Student, { where: { courseId: course.id } })
      : await this.studentRepository.count({ where: { courseId: course.id } });
    return course.totalSeats - enrolled;
  }

  async hasAvailableSeats(course: Course, manager?: EntityManager): Promise<boolean> {
    return (await this.getAvailableSeats(course, manager)) > 0;
  }

  async isAcceptingApplications(course: Course): Promise<boolean> {
    return course.isActive && (await this.hasAvailableSeats(course));
  }

  async getSeatAvailability(id: string): Promise<SeatAvailability> {
    const course = await this.findOne(id);
    const available = await this.getAvailableSeats(course);
    return {
      courseId: course.id,
      totalSeats: course.totalSeats,
      enrolled: course.totalSeats - available,
      available,
      acceptingApplications: course.isActive && available > 0,
    };
  }
}
