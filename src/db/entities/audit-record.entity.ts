import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, Index } from "typeorm";

/**
 * AuditRecord Entity
 *
 * Provenance of one finalized task in one engine invocation: how it ran
 * (backend or fallback), how it ended and what it produced. Rows are only
 * ever inserted.
 */
@Entity({ name: "audit_records" })
@Index("IDX_audit_records_submission_task", ["submissionId", "taskName"])
export class AuditRecordEntity {
    @PrimaryGeneratedColumn()
    id!: number;

    @Index("IDX_audit_records_invocation_id")
    @Column({ name: "invocation_id", type: "uuid" })
    invocationId!: string;

    @Column({ name: "submission_id", type: "varchar", length: 64 })
    submissionId!: string;

    @Column({ name: "task_name", type: "varchar", length: 64 })
    taskName!: string;

    @Column({ type: "varchar", length: 20 })
    status!: string; // succeeded, fell_back, timed_out, failed

    @Column({ type: "varchar", length: 10 })
    mode!: string; // backend, fallback

    @Column({ name: "error_kind", type: "varchar", length: 40, nullable: true })
    errorKind!: string | null;

    @Column({ name: "raw_output", type: "jsonb", nullable: true })
    rawOutput!: unknown;

    @Column({ name: "elapsed_ms", type: "int", default: 0 })
    elapsedMs!: number;

    @CreateDateColumn({ name: "created_at" })
    createdAt!: Date;
}
