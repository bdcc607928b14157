import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateAuditRecordTable1760600100000 implements MigrationInterface {
    name = 'CreateAuditRecordTable1760600100000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "audit_records" ("id" SERIAL NOT NULL, "invocation_id" uuid NOT NULL, "submission_id" character varying(64) NOT NULL, "task_name" character varying(64) NOT NULL, "status" character varying(20) NOT NULL, "mode" character varying(10) NOT NULL, "error_kind" character varying(40), "raw_output" jsonb, "elapsed_ms" integer NOT NULL DEFAULT '0', "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_audit_records_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_audit_records_invocation_id" ON "audit_records" ("invocation_id") `);
        await queryRunner.query(`CREATE INDEX "IDX_audit_records_submission_task" ON "audit_records" ("submission_id", "task_name") `);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "public"."IDX_audit_records_submission_task"`);
        await queryRunner.query(`DROP INDEX "public"."IDX_audit_records_invocation_id"`);
        await queryRunner.query(`DROP TABLE "audit_records"`);
    }

}
