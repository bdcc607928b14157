import { vi } from 'vitest';
import { ILogger } from '../src/config/logger';
import { ProfileSnapshot, ProfileSnapshotData, RoleContext, RoleContextData } from '../src/types/profile';
import { FinalizedTaskResult } from '../src/types/task';
import {
    ALIGNMENT_TASK,
    CONTENT_OPTIMIZATION_TASK,
    JOB_ANALYSIS_TASK,
    QUALITY_REVIEW_TASK,
    ROLE_CALIBRATION_TASK
} from '../src/tasks';
import { checkAlignmentFallback } from '../src/tasks/alignment.task';
import { optimizeContentFallback } from '../src/tasks/content-optimization.task';
import { analyzeJobFallback } from '../src/tasks/job-analysis.task';
import { reviewQualityFallback } from '../src/tasks/quality-review.task';
import { calibrateRoleFallback } from '../src/tasks/role-calibration.task';

export function createMockLogger(): ILogger {
    return {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    };
}

/**
 * A data engineer whose bullets mention Python and SQL but never AWS.
 */
export function buildProfile(overrides: Partial<ProfileSnapshotData> = {}): ProfileSnapshotData {
    return {
        name: 'Jordan Lee',
        email: 'jordan@example.com',
        phone: undefined,
        location: 'Denver, CO',
        linkedin: undefined,
        website: undefined,
        summary: 'Data engineer building reliable pipelines.',
        skills: [
            { name: 'Python', category: 'Languages' },
            { name: 'SQL', category: 'Languages' },
            { name: 'Docker', category: 'Tools' }
        ],
        experience: [
            {
                title: 'Data Engineer',
                company: 'Acme Analytics',
                location: undefined,
                startDate: '2019-01',
                endDate: undefined,
                current: true,
                bullets: [
                    'Built Python ETL pipelines processing 2M rows daily',
                    'Tuned SQL queries, cutting report latency by 40%'
                ]
            },
            {
                title: 'Analyst',
                company: 'Northwind',
                location: undefined,
                startDate: '2016-06',
                endDate: '2018-12',
                current: false,
                bullets: ['Maintained SQL dashboards for 12 regional teams']
            }
        ],
        education: [
            {
                degree: "Bachelor's degree",
                fieldOfStudy: 'Computer Science',
                institution: 'State University',
                startDate: '2012',
                endDate: '2016',
                gpa: undefined
            }
        ],
        projects: [],
        ...overrides
    };
}

export function buildRole(overrides: Partial<RoleContextData> = {}): RoleContextData {
    return {
        companyName: 'Globex',
        roleTitle: 'Data Engineer',
        jobDescription: 'Python, SQL, AWS',
        notes: undefined,
        ...overrides
    };
}

export function finalizedResult(task: string, output: unknown): FinalizedTaskResult {
    return {
        task,
        status: 'fell_back',
        output,
        mode: 'fallback',
        error: { kind: 'backend_unavailable', message: 'No backend configured' },
        startedAt: 0,
        finishedAt: 0,
        elapsedMs: 0
    };
}

/** What a fallback-only run of the default task set finalizes. */
export function fallbackResults(profile: ProfileSnapshot, role: RoleContext): Map<string, FinalizedTaskResult> {
    const job = analyzeJobFallback(role);
    const optimization = optimizeContentFallback(profile, job);
    return new Map([
        [JOB_ANALYSIS_TASK, finalizedResult(JOB_ANALYSIS_TASK, job)],
        [QUALITY_REVIEW_TASK, finalizedResult(QUALITY_REVIEW_TASK, reviewQualityFallback(profile))],
        [CONTENT_OPTIMIZATION_TASK, finalizedResult(CONTENT_OPTIMIZATION_TASK, optimization)],
        [ROLE_CALIBRATION_TASK, finalizedResult(ROLE_CALIBRATION_TASK, calibrateRoleFallback(profile, job.seniorityLevel))],
        [ALIGNMENT_TASK, finalizedResult(ALIGNMENT_TASK, checkAlignmentFallback(profile, job, optimization))]
    ]);
}
