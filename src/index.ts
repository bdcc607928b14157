import "reflect-metadata";
import express, { Request, Response } from "express";
import { config } from "dotenv";
import { AppDataSource } from "./db/data-source";
import { tailorRoutes } from "./routes/tailor";
import { statusRoutes } from "./routes/status";
import { auditRoutes } from "./routes/audit";
import { logger } from "./config/logger";
import { errorMessage } from "./utils/error.util";
import { loadEngineConfig } from "./config/engine.config";
import { getQueueConfig } from "./queue/queue-config";
import { createTailoringProcessor, TailoringWorker } from "./workers/tailoring-worker";

// Load environment variables
config();

const app = express();
const PORT = process.env.PORT || 3000;

// Middleware
app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/tailor", tailorRoutes);
app.use("/status", statusRoutes);
app.use("/audit", auditRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Resume Tailoring Engine API",
        version: "1.0.0",
        description: "Tailors a structured candidate profile to a job posting and scores the fit",
        endpoints: {
            "Tailoring": {
                "POST /tailor": "Queue a profile and role context for tailoring (async)",
                "GET /tailor/:id": "Get submission status and the tailored resume"
            },
            "Diagnostics": {
                "GET /status": "Execution mode of each task in the latest invocation",
                "GET /audit/:submissionId": "Audit records of a submission"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        }
    });
});

async function startServer() {
    try {
        const engineConfig = loadEngineConfig();

        await AppDataSource.initialize();
        logger.info({}, "Database connection established");

        // Validates the task graph; a bad graph exits here, before any job is taken.
        const processor = createTailoringProcessor(TailoringWorker.create(engineConfig));

        const queueConfig = getQueueConfig();
        queueConfig.startWorker(processor);
        logger.info({
            workerPoolSize: engineConfig.workerPoolSize,
            taskTimeoutMs: engineConfig.taskTimeoutMs,
            deadlineMs: engineConfig.deadlineMs,
            backendEnabled: engineConfig.backendEnabled,
            model: engineConfig.llmModel
        }, "Queue system initialized and worker started");

        app.listen(PORT, () => {
            logger.info({ port: PORT }, `Server running at http://localhost:${PORT}`);
        });
    } catch (error) {
        logger.error({ error: errorMessage(error) }, "Failed to start server");
        process.exit(1);
    }
}

void startServer();
