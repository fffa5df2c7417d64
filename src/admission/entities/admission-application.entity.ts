import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { Course } from '../../course/entities/course.entity';
import { Staff } from '../../staff/entities/staff.entity';
import { Student } from '../../student/entities/student.entity';
import { Gender } from '../../common/enums/gender.enum';
import { ApplicationStatus } from '../enums/application-status.enum';
import { GeneratedBy } from '../enums/generated-by.enum';

@Entity('admission_applications')
export class AdmissionApplication {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // ADM + year + 6-digit serial, e.g. ADM2025000001
  @Index({ unique: true })
  @Column({ length: 20 })
  applicationId!: string;

  @Column({ length: 100 })
  name!: string;

  @Index()
  @Column({ length: 120 })
  email!: string;

  @Column({ length: 15 })
  phone!: string;

  // ISO calendar date (YYYY-MM-DD)
  @Column({ type: 'date' })
  dateOfBirth!: string;

  @Column({ type: 'enum', enum: Gender })
  gender!: Gender;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  city!: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  state!: string | null;

  @Column({ type: 'varchar', length: 10, nullable: true })
  pincode!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  fatherName!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  motherName!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  guardianName!: string | null;

  @Column({ type: 'varchar', length: 15, nullable: true })
  guardianPhone!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  guardianEmail!: string | null;

  @Column({ type: 'varchar', length: 15, nullable: true })
  emergencyContact!: string | null;

  @Column({ type: 'text', nullable: true })
  medicalConditions!: string | null;

  @Column({ type: 'text', nullable: true })
  previousEducation!: string | null;

  @Index()
  @Column({ type: 'uuid' })
  courseId!: string;

  @ManyToOne(() => Course, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'courseId' })
  course?: Course;

  @Column({ type: 'int', nullable: true })
  tenthPercentage!: number | null;

  @Column({ type: 'int', nullable: true })
  twelfthPercentage!: number | null;

  @Column({ type: 'int', nullable: true })
  entranceExamScore!: number | null;

  // Lets the applicant track the application.
  @Column({ type: 'varchar', length: 255, nullable: true })
  passwordHash!: string | null;

  @Index()
  @Column({ type: 'enum', enum: ApplicationStatus, default: ApplicationStatus.SUBMITTED })
  status!: ApplicationStatus;

  @Column({ type: 'enum', enum: GeneratedBy, default: GeneratedBy.STUDENT })
  generatedBy!: GeneratedBy;

  @Index()
  @Column({ type: 'uuid', nullable: true })
  staffId!: string | null;

  @ManyToOne(() => Staff, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'staffId' })
  processedByStaff?: Staff | null;

  // Set only once approved.
  @Column({ type: 'varchar', length: 20, nullable: true })
  studentId!: string | null;

  @ManyToOne(() => Student, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'studentId', referencedColumnName: 'rollNo' })
  student?: Student | null;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;

  @Column({ type: 'text', nullable: true })
  rejectionReason!: string | null;

  @Column({ type: 'timestamp', nullable: true })
  processedOn!: Date | null;

  // JSON text: { [document]: verified }
  @Column({ type: 'text', nullable: true })
  documentsVerified!: string | null;

  // JSON text: string[]
  @Column({ type: 'text', nullable: true })
  documentsRequired!: string | null;

  @Column({ type: 'timestamp', default: () => 'CURRENT_TIMESTAMP' })
  applicationDate!: Date;

  @UpdateDateColumn()
  updatedOn!: Date;
}
