import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { errorMessage } from "../utils/error.util";
import { getAuditCache } from "../services/audit-cache.service";

const router = Router();

/**
 * GET /status
 *
 * Execution mode of every task in the most recent invocation.
 *
 * Returns: { invocation: InvocationStatus | null }
 */
router.get('/', async (req: Request, res: Response) => {
    try {
        const invocation = await getAuditCache().latestStatuses();
        res.json({ invocation });
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Status lookup failed');
        res.status(500).json({
            error: 'Status lookup failed',
            message: errorMessage(error)
        });
    }
});

export { router as statusRoutes };
