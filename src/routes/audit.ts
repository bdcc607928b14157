import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { errorMessage } from "../utils/error.util";
import { getAuditCache } from "../services/audit-cache.service";

const router = Router();

/**
 * GET /audit/:submissionId
 *
 * Every audit record written for a submission, across all of its
 * invocations, oldest first.
 */
router.get('/:submissionId', async (req: Request, res: Response) => {
    try {
        const records = await getAuditCache().recordsForSubmission(req.params.submissionId);

        if (records.length === 0) {
            return res.status(404).json({
                error: 'No audit records for this submission'
            });
        }

        res.json({
            submissionId: req.params.submissionId,
            invocations: new Set(records.map(record => record.invocationId)).size,
            records
        });
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Audit lookup failed');
        res.status(500).json({
            error: 'Audit lookup failed',
            message: errorMessage(error)
        });
    }
});

export { router as auditRoutes };
