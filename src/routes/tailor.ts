import { Router, Request, Response } from "express";
import { z } from "zod";
import { AppDataSource } from "../db/data-source";
import { Submission } from "../db/entities/submission.entity";
import { logger } from "../config/logger";
import { errorMessage } from "../utils/error.util";
import { getQueueConfig, tailorJobId, TAILOR_JOB } from "../queue/queue-config";
import { ProfileSnapshotSchema, RoleContextSchema } from "../types/profile";

const router = Router();

const tailorSchema = z.object({
    profile: ProfileSnapshotSchema,
    role: RoleContextSchema
});

/**
 * POST /tailor
 *
 * Queue a profile for tailoring against one job posting.
 *
 * Body: { profile: ProfileSnapshot, role: RoleContext }
 * Returns: { id: number, status: string }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const { profile, role } = tailorSchema.parse(req.body);

        const submissionRepository = AppDataSource.getRepository(Submission);
        const submission = await submissionRepository.save(submissionRepository.create({
            status: 'queued',
            companyName: role.companyName,
            roleTitle: role.roleTitle
        }));

        logger.info({
            submissionId: submission.id,
            roleTitle: role.roleTitle,
            companyName: role.companyName
        }, 'Tailoring submission created');

        try {
            const tailoringQueue = getQueueConfig().getTailoringQueue();
            await tailoringQueue.add(TAILOR_JOB, {
                submissionId: submission.id,
                profile,
                role
            }, {
                jobId: tailorJobId(submission.id)
            });

            logger.info({
                submissionId: submission.id,
                queueName: tailoringQueue.name
            }, 'Tailoring job added to queue');

        } catch (error) {
            submission.status = 'failed';
            submission.error_code = 'queue_error';
            await submissionRepository.save(submission);

            logger.error({
                submissionId: submission.id,
                error: errorMessage(error)
            }, 'Failed to add job to queue');
        }

        res.json({
            id: submission.id,
            status: submission.status
        });

    } catch (error) {
        if (error instanceof z.ZodError) {
            return res.status(400).json({
                error: 'Validation failed',
                details: error.errors
            });
        }

        logger.error({ error: errorMessage(error) }, 'Tailoring request failed');
        res.status(500).json({
            error: 'Tailoring request failed',
            message: errorMessage(error)
        });
    }
});

/**
 * GET /tailor/:id
 *
 * Status of a submission, and the tailored resume with its score once it
 * has completed. The payload is read back from the queue; it expires with
 * the completed job.
 *
 * Returns: { id, status, result?: { invocationId, resume, score, tasks } }
 */
router.get('/:id', async (req: Request, res: Response) => {
    try {
        const submissionId = parseInt(req.params.id, 10);

        if (isNaN(submissionId)) {
            return res.status(400).json({
                error: 'Invalid submission ID'
            });
        }

        const submissionRepository = AppDataSource.getRepository(Submission);
        const submission = await submissionRepository.findOne({ where: { id: submissionId } });

        if (!submission) {
            return res.status(404).json({
                error: 'Submission not found'
            });
        }

        if (submission.status === 'queued' || submission.status === 'processing') {
            return res.json({
                id: submission.id,
                status: submission.status
            });
        }

        if (submission.status === 'failed') {
            return res.status(500).json({
                id: submission.id,
                status: submission.status,
                error: 'Tailoring failed',
                error_code: submission.error_code,
                attempts: submission.attempts
            });
        }

        const job = await getQueueConfig().getTailoringQueue().getJob(tailorJobId(submission.id));
        if (!job || !job.returnvalue) {
            return res.status(410).json({
                id: submission.id,
                status: submission.status,
                error: 'Result expired',
                invocationId: submission.lastInvocationId
            });
        }

        const { invocationId, resume, score, tasks } = job.returnvalue;

        logger.info({
            submissionId: submission.id,
            invocationId
        }, 'Results retrieved');

        return res.json({
            id: submission.id,
            status: submission.status,
            result: { invocationId, resume, score, tasks }
        });

    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Result retrieval failed');
        res.status(500).json({
            error: 'Result retrieval failed',
            message: errorMessage(error)
        });
    }
});

export { router as tailorRoutes };
