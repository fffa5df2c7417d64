// src/examination/entities/examination.entity.ts
import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { Student } from '../../student/entities/student.entity';
import { Course } from '../../course/entities/course.entity';
import { Staff } from '../../staff/entities/staff.entity';
import { ExamType } from '../enums/exam-type.enum';
import { Grade } from '../enums/grade.enum';

// One examination attempt. grade/gradePoints are set iff resultDeclaredDate is.
@Entity('examinations')
@Index(['courseId', 'semester', 'academicYear'])
export class Examination {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ length: 20 })
  studentId!: string;

  @ManyToOne(() => Student, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId', referencedColumnName: 'rollNo' })
  student?: Student;

  @Column({ type: 'uuid' })
  courseId!: string;

  @ManyToOne(() => Course, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'courseId' })
  course?: Course;

  @Column({ type: 'enum', enum: ExamType, default: ExamType.SEMESTER })
  examType!: ExamType;

  @Column({ length: 100 })
  subjectName!: string;

  @Column({ length: 20 })
  subjectCode!: string;

  @Column({ type: 'int' })
  semester!: number;

  // e.g. 2025-26
  @Column({ length: 10 })
  academicYear!: string;

  @Column({ type: 'timestamp' })
  examDate!: Date;

  @Column({ type: 'timestamp', nullable: true })
  resultDeclaredDate!: Date | null;

  @Column({ type: 'int', default: 100 })
  maxMarks!: number;

  @Column({ type: 'int', nullable: true })
  marksObtained!: number | null;

  @Column({ type: 'enum', enum: Grade, nullable: true })
  grade!: Grade | null;

  @Column({ type: 'double precision', nullable: true })
  gradePoints!: number | null;

  @Column({ type: 'int', default: 0 })
  internalMarks!: number;

  @Column({ type: 'int', default: 0 })
  externalMarks!: number;

  // null until declared
  @Column({ type: 'boolean', nullable: true })
  isPass!: boolean | null;

  @Column({ default: false })
  isAbsent!: boolean;

  @Column({ default: false })
  hasMalpractice!: boolean;

  @Column({ type: 'text', nullable: true })
  remarks!: string | null;

  @Column({ type: 'uuid', nullable: true })
  resultProcessedBy!: string | null;

  @ManyToOne(() => Staff, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'resultProcessedBy' })
  processedByStaff?: Staff | null;

  @CreateDateColumn()
  createdOn!: Date;

  @UpdateDateColumn()
  updatedOn!: Date;
}
