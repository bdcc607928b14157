import { config } from "dotenv";
import { DataSource } from "typeorm";
import { Submission } from "./entities/submission.entity";
import { AuditRecordEntity } from "./entities/audit-record.entity";
import { CreateSubmissionTable1760600000000 } from "./migrations/1760600000000-create-submission-table";
import { CreateAuditRecordTable1760600100000 } from "./migrations/1760600100000-create-audit-record-table";

config();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: process.env.DATABASE_URL,
    synchronize: false,
    logging: process.env.NODE_ENV === 'development',
    entities: [Submission, AuditRecordEntity],
    migrations: [CreateSubmissionTable1760600000000, CreateAuditRecordTable1760600100000],
});
