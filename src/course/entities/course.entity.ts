// src/course/entities/course.entity.ts
import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('courses')
export class Course {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Diploma, B.Tech, M.Tech ...
  @Column({ length: 50 })
  programLevel!: string;

  @Column({ length: 100 })
  degreeName!: string;

  @Column({ length: 200 })
  courseName!: string;

  @Column({ length: 20, unique: true })
  courseCode!: string;

  @Column({ type: 'int', default: 4 })
  durationYears!: number;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'int', default: 50000 })
  feesPerSemester!: number;

  @Column({ type: 'int', default: 60 })
  totalSeats!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdOn!: Date;

  @UpdateDateColumn()
  updatedOn!: Date;
}

export function courseDisplayName(course: Pick<Course, 'programLevel' | 'courseName'>): string {
  return `${course.programLevel} in ${course.courseName}`;
}
