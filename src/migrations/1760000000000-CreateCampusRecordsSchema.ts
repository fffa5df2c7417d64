import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateCampusRecordsSchema1760000000000 implements MigrationInterface {
    name = 'CreateCampusRecordsSchema1760000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);
        await queryRunner.query(`CREATE TYPE "public"."students_gender_enum" AS ENUM('Male', 'Female', 'Other')`);
        await queryRunner.query(`CREATE TYPE "public"."admission_applications_gender_enum" AS ENUM('Male', 'Female', 'Other')`);
        await queryRunner.query(`CREATE TYPE "public"."admission_applications_status_enum" AS ENUM('submitted', 'under_review', 'approved', 'declined', 'waitlisted', 'documents_pending')`);
        await queryRunner.query(`CREATE TYPE "public"."admission_applications_generatedby_enum" AS ENUM('student', 'staff')`);
        await queryRunner.query(`CREATE TYPE "public"."examinations_examtype_enum" AS ENUM('internal', 'semester', 'final', 'supplementary')`);
        await queryRunner.query(`CREATE TYPE "public"."examinations_grade_enum" AS ENUM('O', 'A+', 'A', 'B+', 'B', 'C', 'P', 'F', 'AB', 'MP')`);

        await queryRunner.query(`CREATE TABLE "courses" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "programLevel" character varying(50) NOT NULL, "degreeName" character varying(100) NOT NULL, "courseName" character varying(200) NOT NULL, "courseCode" character varying(20) NOT NULL, "durationYears" integer NOT NULL DEFAULT 4, "description" text, "feesPerSemester" integer NOT NULL DEFAULT 50000, "totalSeats" integer NOT NULL DEFAULT 60, "isActive" boolean NOT NULL DEFAULT true, "createdOn" TIMESTAMP NOT NULL DEFAULT now(), "updatedOn" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_courses_courseCode" UNIQUE ("courseCode"), CONSTRAINT "PK_courses" PRIMARY KEY ("id"))`);

        await queryRunner.query(`CREATE TABLE "staff" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "employeeId" character varying(20) NOT NULL, "fullName" character varying(100) NOT NULL, "email" character varying(120) NOT NULL, "designation" character varying(100), "isActive" boolean NOT NULL DEFAULT true, "createdOn" TIMESTAMP NOT NULL DEFAULT now(), "updatedOn" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_staff_employeeId" UNIQUE ("employeeId"), CONSTRAINT "UQ_staff_email" UNIQUE ("email"), CONSTRAINT "PK_staff" PRIMARY KEY ("id"))`);

        await queryRunner.query(`CREATE TABLE "students" ("rollNo" character varying(20) NOT NULL, "name" character varying(100) NOT NULL, "email" character varying(120) NOT NULL, "phone" character varying(15) NOT NULL, "dateOfBirth" date NOT NULL, "gender" "public"."students_gender_enum" NOT NULL, "address" text, "city" character varying(50), "state" character varying(50), "pincode" character varying(10), "fatherName" character varying(100), "motherName" character varying(100), "guardianPhone" character varying(15), "guardianEmail" character varying(120), "courseId" uuid NOT NULL, "admissionYear" integer NOT NULL, "currentSemester" integer NOT NULL DEFAULT 1, "passwordHash" character varying(255), "isActive" boolean NOT NULL DEFAULT true, "registeredOn" TIMESTAMP NOT NULL DEFAULT now(), "updatedOn" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_students_email" UNIQUE ("email"), CONSTRAINT "PK_students" PRIMARY KEY ("rollNo"))`);
        await queryRunner.query(`CREATE INDEX "IDX_students_course_year" ON "students" ("courseId", "admissionYear")`);
        await queryRunner.query(`ALTER TABLE "students" ADD CONSTRAINT "FK_students_course" FOREIGN KEY ("courseId") REFERENCES "courses"("id") ON DELETE RESTRICT`);

        await queryRunner.query(`CREATE TABLE "admission_applications" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "applicationId" character varying(20) NOT NULL, "name" character varying(100) NOT NULL, "email" character varying(120) NOT NULL, "phone" character varying(15) NOT NULL, "dateOfBirth" date NOT NULL, "gender" "public"."admission_applications_gender_enum" NOT NULL, "address" text, "city" character varying(50), "state" character varying(50), "pincode" character varying(10), "fatherName" character varying(100), "motherName" character varying(100), "guardianName" character varying(100), "guardianPhone" character varying(15), "guardianEmail" character varying(120), "emergencyContact" character varying(15), "medicalConditions" text, "previousEducation" text, "courseId" uuid NOT NULL, "tenthPercentage" integer, "twelfthPercentage" integer, "entranceExamScore" integer, "passwordHash" character varying(255), "status" "public"."admission_applications_status_enum" NOT NULL DEFAULT 'submitted', "generatedBy" "public"."admission_applications_generatedby_enum" NOT NULL DEFAULT 'student', "staffId" uuid, "studentId" character varying(20), "remarks" text, "rejectionReason" text, "processedOn" TIMESTAMP, "documentsVerified" text, "documentsRequired" text, "applicationDate" TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP, "updatedOn" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_admission_applications" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE UNIQUE INDEX "IDX_admission_applications_applicationId" ON "admission_applications" ("applicationId")`);
        await queryRunner.query(`CREATE INDEX "IDX_admission_applications_email" ON "admission_applications" ("email")`);
        await queryRunner.query(`CREATE INDEX "IDX_admission_applications_courseId" ON "admission_applications" ("courseId")`);
        await queryRunner.query(`CREATE INDEX "IDX_admission_applications_status" ON "admission_applications" ("status")`);
        await queryRunner.query(`CREATE INDEX "IDX_admission_applications_staffId" ON "admission_applications" ("staffId")`);
        await queryRunner.query(`ALTER TABLE "admission_applications" ADD CONSTRAINT "FK_admission_applications_course" FOREIGN KEY ("courseId") REFERENCES "courses"("id") ON DELETE RESTRICT`);
        await queryRunner.query(`ALTER TABLE "admission_applications" ADD CONSTRAINT "FK_admission_applications_staff" FOREIGN KEY ("staffId") REFERENCES "staff"("id") ON DELETE SET NULL`);
        await queryRunner.query(`ALTER TABLE "admission_applications" ADD CONSTRAINT "FK_admission_applications_student" FOREIGN KEY ("studentId") REFERENCES "students"("rollNo") ON DELETE SET NULL`);

        await queryRunner.query(`CREATE TABLE "examinations" ("id" uuid NOT NULL DEFAULT uuid_generate_v4(), "studentId" character varying(20) NOT NULL, "courseId" uuid NOT NULL, "examType" "public"."examinations_examtype_enum" NOT NULL DEFAULT 'semester', "subjectName" character varying(100) NOT NULL, "subjectCode" character varying(20) NOT NULL, "semester" integer NOT NULL, "academicYear" character varying(10) NOT NULL, "examDate" TIMESTAMP NOT NULL, "resultDeclaredDate" TIMESTAMP, "maxMarks" integer NOT NULL DEFAULT 100, "marksObtained" integer, "grade" "public"."examinations_grade_enum", "gradePoints" double precision, "internalMarks" integer NOT NULL DEFAULT 0, "externalMarks" integer NOT NULL DEFAULT 0, "isPass" boolean, "isAbsent" boolean NOT NULL DEFAULT false, "hasMalpractice" boolean NOT NULL DEFAULT false, "remarks" text, "resultProcessedBy" uuid, "createdOn" TIMESTAMP NOT NULL DEFAULT now(), "updatedOn" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_examinations" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_examinations_studentId" ON "examinations" ("studentId")`);
        await queryRunner.query(`CREATE INDEX "IDX_examinations_course_semester_year" ON "examinations" ("courseId", "semester", "academicYear")`);
        await queryRunner.query(`ALTER TABLE "examinations" ADD CONSTRAINT "FK_examinations_student" FOREIGN KEY ("studentId") REFERENCES "students"("rollNo") ON DELETE CASCADE`);
        await queryRunner.query(`ALTER TABLE "examinations" ADD CONSTRAINT "FK_examinations_course" FOREIGN KEY ("courseId") REFERENCES "courses"("id") ON DELETE RESTRICT`);
        await queryRunner.query(`ALTER TABLE "examinations" ADD CONSTRAINT "FK_examinations_staff" FOREIGN KEY ("resultProcessedBy") REFERENCES "staff"("id") ON DELETE SET NULL`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "examinations"`);
        await queryRunner.query(`DROP TABLE "admission_applications"`);
        await queryRunner.query(`DROP TABLE "students"`);
        await queryRunner.query(`DROP TABLE "staff"`);
        await queryRunner.query(`DROP TABLE "courses"`);
        await queryRunner.query(`DROP TYPE "public"."examinations_grade_enum"`);
        await queryRunner.query(`DROP TYPE "public"."examinations_examtype_enum"`);
        await queryRunner.query(`DROP TYPE "public"."admission_applications_generatedby_enum"`);
        await queryRunner.query(`DROP TYPE "public"."admission_applications_status_enum"`);
        await queryRunner.query(`DROP TYPE "public"."admission_applications_gender_enum"`);
        await queryRunner.query(`DROP TYPE "public"."students_gender_enum"`);
    }

}
