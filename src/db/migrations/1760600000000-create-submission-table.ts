import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateSubmissionTable1760600000000 implements MigrationInterface {
    name = 'CreateSubmissionTable1760600000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "submissions" ("id" SERIAL NOT NULL, "status" character varying(20) NOT NULL DEFAULT 'queued', "company_name" character varying(255) NOT NULL, "role_title" character varying(255) NOT NULL, "last_invocation_id" uuid, "error_code" character varying(50), "attempts" integer NOT NULL DEFAULT '0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_submissions_id" PRIMARY KEY ("id"))`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "submissions"`);
    }

}
