import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseBoolPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AdmissionService, ApplicationWorkflowResponse } from './admission.service';
import { CreateApplicationDto } from './dtos/create-application.dto';
import {
  ApproveApplicationDto,
  DeclineApplicationDto,
  RequestDocumentsDto,
  ReviewApplicationDto,
  TrackApplicationDto,
  VerifyDocumentDto,
  WaitlistApplicationDto,
} from './dtos/decision.dto';
import { ListApplicationsQueryDto, StatisticsQueryDto } from './dtos/application-query.dto';

// A rejected transition is a client error.
function unwrap(response: ApplicationWorkflowResponse): ApplicationWorkflowResponse {
  if (!response.success) throw new BadRequestException(response.message);
  return response;
}

@ApiTags('Admissions')
@Controller('admissions')
export class AdmissionController {
  constructor(private readonly admissionService: AdmissionService) {}

  @Post()
  @ApiOperation({ summary: 'Submit a new admission application' })
  @ApiResponse({ status: 201, description: 'Application submitted' })
  @ApiResponse({ status: 409, description: 'Application already exists for this course' })
  apply(@Body() dto: CreateApplicationDto) {
    return this.admissionService.createApplication(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List applications, optionally filtered by status or course' })
  list(@Query() query: ListApplicationsQueryDto) {
    return this.admissionService.list(query);
  }

  @Get('pending')
  pending() {
    return this.admissionService.getPendingApplications();
  }

  @Get('statistics')
  @ApiOperation({ summary: 'Admission statistics for an optional date range' })
  statistics(@Query() query: StatisticsQueryDto) {
    return this.admissionService.getStatistics(query);
  }

  @Get(':applicationId')
  findOne(
    @Param('applicationId') applicationId: string,
    @Query('includeSensitive', new ParseBoolPipe({ optional: true })) includeSensitive?: boolean,
  ) {
    return this.admissionService.getApplication(applicationId, includeSensitive ?? false);
  }

  @Get(':applicationId/status')
  @ApiOperation({ summary: 'Public application status lookup' })
  status(@Param('applicationId') applicationId: string) {
    return this.admissionService.getStatusView(applicationId);
  }

  @Post(':applicationId/track')
  @HttpCode(200)
  @ApiOperation({ summary: 'Full application details for the applicant' })
  track(@Param('applicationId') applicationId: string, @Body() dto: TrackApplicationDto) {
    return this.admissionService.trackApplication(applicationId, dto.password);
  }

  @Get(':applicationId/eligibility')
  eligibility(@Param('applicationId') applicationId: string) {
    return this.admissionService.checkEligibility(applicationId);
  }

  @Post(':applicationId/review')
  @HttpCode(200)
  async review(@Param('applicationId') applicationId: string, @Body() dto: ReviewApplicationDto) {
    return unwrap(await this.admissionService.markUnderReview(applicationId, dto.remarks));
  }

  @Post(':applicationId/approve')
  @HttpCode(200)
  @ApiResponse({ status: 400, description: 'Not pending or no seats left' })
  async approve(@Param('applicationId') applicationId: string, @Body() dto: ApproveApplicationDto) {
    return unwrap(await this.admissionService.approve(applicationId, dto));
  }

  @Post(':applicationId/decline')
  @HttpCode(200)
  async decline(@Param('applicationId') applicationId: string, @Body() dto: DeclineApplicationDto) {
    return unwrap(await this.admissionService.decline(applicationId, dto));
  }

  @Post(':applicationId/waitlist')
  @HttpCode(200)
  async waitlist(@Param('applicationId') applicationId: string, @Body() dto: WaitlistApplicationDto) {
    return unwrap(await this.admissionService.waitlist(applicationId, dto));
  }

  @Post(':applicationId/request-documents')
  @HttpCode(200)
  async requestDocuments(@Param('applicationId') applicationId: string, @Body() dto: RequestDocumentsDto) {
    return unwrap(await this.admissionService.requestDocuments(applicationId, dto));
  }

  @Post(':applicationId/verify-document')
  @HttpCode(200)
  async verifyDocument(@Param('applicationId') applicationId: string, @Body() dto: VerifyDocumentDto) {
    return unwrap(await this.admissionService.verifyDocument(applicationId, dto));
  }
}
