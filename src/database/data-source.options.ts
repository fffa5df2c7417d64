import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { AdmissionApplication } from '../admission/entities/admission-application.entity';
import { Course } from '../course/entities/course.entity';
import { Examination } from '../examination/entities/examination.entity';
import { Staff } from '../staff/entities/staff.entity';
import { Student } from '../student/entities/student.entity';

export const ENTITIES = [Course, Staff, Student, AdmissionApplication, Examination];

export function buildDataSourceOptions(configService: ConfigService): DataSourceOptions {
  return {
    type: 'postgres',
    host: configService.getOrDefault('DB_HOST', 'localhost'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.getOrDefault('DB_DATABASE', 'campus_records'),
    entities: ENTITIES,
    migrations: [__dirname + '/../migrations/*{.ts,.js}'],
    synchronize: false,
    logging: configService.getOrDefault('NODE_ENV', 'development') === 'development',
  };
}
