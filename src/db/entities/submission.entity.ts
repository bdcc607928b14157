import { Column, Entity, PrimaryGeneratedColumn, CreateDateColumn, UpdateDateColumn } from "typeorm";

export type SubmissionStatus = "queued" | "processing" | "completed" | "failed";

/**
 * Submission Entity
 *
 * One tailoring request, tracked from enqueue to completion. Only the
 * lifecycle is stored here: the profile, role context, tailored resume and
 * score travel through the queue and are never written to the database.
 *
 * Lifecycle:
 * 1. POST /tailor → row created with status "queued"
 * 2. Worker picks up the job → "processing"
 * 3. Engine returns → "completed", or "failed" with error_code
 *
 * Each run of the engine for a submission appends its own AuditRecord set,
 * grouped by invocation_id.
 */
@Entity({ name: "submissions" })
export class Submission {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({
        type: "varchar",
        length: 20,
        default: "queued"
    })
    status!: SubmissionStatus;

    @Column({ name: "company_name", type: "varchar", length: 255 })
    companyName!: string;

    @Column({ name: "role_title", type: "varchar", length: 255 })
    roleTitle!: string;

    @Column({ name: "last_invocation_id", type: "uuid", nullable: true })
    lastInvocationId!: string | null;

    @Column({
        type: "varchar",
        length: 50,
        nullable: true
    })
    error_code!: string | null; // graph_configuration, fallback_defect, processing_error

    @Column({
        type: "int",
        default: 0
    })
    attempts!: number;

    @CreateDateColumn()
    created_at!: Date;

    @UpdateDateColumn()
    updated_at!: Date;
}
