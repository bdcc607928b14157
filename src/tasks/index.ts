import { IBackendAdapter } from '../services/backend.service';
import { AnyTaskSpec } from '../types/task';
import { createAlignmentTask } from './alignment.task';
import { createContentOptimizationTask } from './content-optimization.task';
import { createJobAnalysisTask } from './job-analysis.task';
import { createQualityReviewTask } from './quality-review.task';
import { createRoleCalibrationTask } from './role-calibration.task';

export { ALIGNMENT_TASK } from './alignment.task';
export { CONTENT_OPTIMIZATION_TASK } from './content-optimization.task';
export { JOB_ANALYSIS_TASK } from './job-analysis.task';
export { QUALITY_REVIEW_TASK } from './quality-review.task';
export { ROLE_CALIBRATION_TASK } from './role-calibration.task';

/**
 * The tailoring DAG, in declaration order. Without an adapter every task
 * runs on its fallback.
 */
export function createDefaultTasks(adapter?: IBackendAdapter): AnyTaskSpec[] {
    return [
        createJobAnalysisTask(adapter),
        createQualityReviewTask(adapter),
        createContentOptimizationTask(adapter),
        createRoleCalibrationTask(adapter),
        createAlignmentTask(adapter)
    ];
}
