// src/student/entities/student.entity.ts
import {
  Entity,
  Column,
  ManyToOne,
  JoinColumn,
  PrimaryColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { Course } from '../../course/entities/course.entity';
import { Gender } from '../../common/enums/gender.enum';

@Entity('students')
@Index(['courseId', 'admissionYear'])
export class Student {
  // <admissionYear><courseCode><4-digit serial>, e.g. 2025CS0001
  @PrimaryColumn({ length: 20 })
  rollNo!: string;

  @Column({ length: 100 })
  name!: string;

  @Column({ length: 120, unique: true })
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

  @Column({ type: 'varchar', length: 15, nullable: true })
  guardianPhone!: string | null;

  @Column({ type: 'varchar', length: 120, nullable: true })
  guardianEmail!: string | null;

  @Column({ type: 'uuid' })
  courseId!: string;

  @ManyToOne(() => Course, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'courseId' })
  course?: Course;

  @Column({ type: 'int' })
  admissionYear!: number;

  @Column({ type: 'int', default: 1 })
  currentSemester!: number;

  @Column({ type: 'varchar', length: 255, nullable: true })
  passwordHash!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  registeredOn!: Date;

  @UpdateDateColumn()
  updatedOn!: Date;
}
