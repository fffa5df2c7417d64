import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

// Staff members are referenced by id as the processor of applications and results.
@Entity('staff')
export class Staff {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 20, unique: true })
  employeeId!: string;

  @Column({ length: 100 })
  fullName!: string;

  @Column({ length: 120, unique: true })
  email!: string;

  @Column({ length: 100, nullable: true })
  designation!: string | null;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdOn!: Date;

  @UpdateDateColumn()
  updatedOn!: Date;
}
