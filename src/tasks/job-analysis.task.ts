import { IBackendAdapter } from '../services/backend.service';
import { RoleContext } from '../types/profile';
import { TaskContext, TaskSpec } from '../types/task';
import { JobAnalysisOutput, JobAnalysisOutputSchema, SeniorityLevel } from '../types/task-outputs';
import { TextIndex, splitSentences, tokenize } from '../utils/text-analysis.util';
import { HARD_SKILLS, SOFT_SKILLS, findMatches } from './lexicon';
import { delegateTo } from './task-helpers';

export const JOB_ANALYSIS_TASK = 'job_analysis';

const MAX_RESPONSIBILITIES = 10;

const RESPONSIBILITY_VERBS = [
    'develop', 'design', 'implement', 'manage', 'lead', 'collaborate', 'build',
    'create', 'analyze', 'optimize', 'maintain', 'own', 'drive', 'deliver'
];

const IRREGULAR_FORMS: Record<string, string[]> = {
    lead: ['led'],
    build: ['built'],
    drive: ['drove', 'driven']
};

const PREFERRED_MARKER = /\b(preferred|prefer|nice[ -]to[ -]have|bonus|a plus)\b/i;

const YEARS_PATTERN = /(\d+)\s*\+?\s*(?:-\s*\d+\s*)?(?:years?|yrs?)\b/i;

// Checked in order; the first level whose words appear in the title wins.
const SENIORITY_TITLE_WORDS: ReadonlyArray<[SeniorityLevel, string[]]> = [
    ['executive', ['director', 'vp', 'vice', 'head', 'chief', 'cto', 'ceo', 'cfo']],
    ['senior', ['senior', 'sr', 'lead', 'principal', 'staff']],
    ['junior', ['junior', 'jr', 'entry', 'associate', 'intern', 'graduate']]
];

const DEGREE_LEVELS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
    { label: "Associate's degree", pattern: /\bassociate'?s? degree\b/i },
    { label: "Bachelor's degree", pattern: /\bbachelor'?s?\b|\bb\.s\.|\bundergraduate degree\b/i },
    { label: "Master's degree", pattern: /\bmaster'?s?\b|\bmba\b/i },
    { label: 'PhD', pattern: /\bph\.?d\b|\bdoctorate\b|\bdoctoral\b/i }
];

const GENERIC_DEGREE = /\bdegree\b/i;

function verbForms(verb: string): Set<string> {
    const stem = verb.endsWith('e') ? verb.slice(0, -1) : verb;
    return new Set([
        verb,
        `${verb}s`,
        `${stem}ed`,
        `${stem}ing`,
        ...(IRREGULAR_FORMS[verb] ?? [])
    ]);
}

const RESPONSIBILITY_FORMS = new Set(RESPONSIBILITY_VERBS.flatMap(verb => [...verbForms(verb)]));

export function inferSeniority(roleTitle: string): SeniorityLevel {
    const words = new Set(tokenize(roleTitle));
    for (const [level, markers] of SENIORITY_TITLE_WORDS) {
        if (markers.some(marker => words.has(marker))) {
            return level;
        }
    }
    return 'mid';
}

interface QualificationCandidate {
    label: string;
    sentence: number;
    position: number;
    preferred: boolean;
}

function tokenPosition(sentence: string, charIndex: number): number {
    return tokenize(sentence.slice(0, charIndex)).length;
}

function degreeRequirement(sentence: string): { label: string; position: number } | null {
    // The lowest level mentioned is the bar; "bachelor's or master's" asks for a bachelor's.
    for (const level of DEGREE_LEVELS) {
        const match = level.pattern.exec(sentence);
        if (match) {
            return { label: level.label, position: tokenPosition(sentence, match.index) };
        }
    }
    const generic = GENERIC_DEGREE.exec(sentence);
    if (generic) {
        return { label: "Bachelor's degree", position: tokenPosition(sentence, generic.index) };
    }
    return null;
}

/**
 * Required and preferred qualifications, each in order of first mention.
 * A qualification that appears both ways counts as required.
 */
function extractQualifications(jobDescription: string): { required: string[]; preferred: string[] } {
    const candidates: QualificationCandidate[] = [];

    splitSentences(jobDescription).forEach((sentence, sentenceIndex) => {
        const preferred = PREFERRED_MARKER.test(sentence);
        const index = new TextIndex(sentence);

        for (const match of findMatches(index, HARD_SKILLS)) {
            candidates.push({ label: match.name, sentence: sentenceIndex, position: match.position, preferred });
        }

        const years = YEARS_PATTERN.exec(sentence);
        if (years) {
            candidates.push({
                label: `${years[1]}+ years of experience`,
                sentence: sentenceIndex,
                position: tokenPosition(sentence, years.index),
                preferred
            });
        }

        const degree = degreeRequirement(sentence);
        if (degree) {
            candidates.push({ label: degree.label, sentence: sentenceIndex, position: degree.position, preferred });
        }
    });

    const ordered = candidates
        .map((candidate, order) => ({ candidate, order }))
        .sort((a, b) =>
            a.candidate.sentence - b.candidate.sentence
            || a.candidate.position - b.candidate.position
            || a.order - b.order)
        .map(({ candidate }) => candidate);

    const required: string[] = [];
    for (const candidate of ordered) {
        if (!candidate.preferred && !required.includes(candidate.label)) {
            required.push(candidate.label);
        }
    }
    const preferred: string[] = [];
    for (const candidate of ordered) {
        if (candidate.preferred && !required.includes(candidate.label) && !preferred.includes(candidate.label)) {
            preferred.push(candidate.label);
        }
    }
    return { required, preferred };
}

function extractResponsibilities(jobDescription: string): string[] {
    const responsibilities: string[] = [];
    for (const sentence of splitSentences(jobDescription)) {
        if (responsibilities.length >= MAX_RESPONSIBILITIES) {
            break;
        }
        const hasVerb = tokenize(sentence).some(token => RESPONSIBILITY_FORMS.has(token));
        if (hasVerb && !responsibilities.includes(sentence)) {
            responsibilities.push(sentence);
        }
    }
    return responsibilities;
}

/**
 * Rule-based job description analysis: lexicon skills, action-verb
 * responsibilities, qualification sentences and title-based seniority.
 */
export function analyzeJobFallback(role: RoleContext): JobAnalysisOutput {
    const index = new TextIndex(role.jobDescription);
    const hardSkills = findMatches(index, HARD_SKILLS).map(match => match.name);
    const softSkills = findMatches(index, SOFT_SKILLS).map(match => match.name);
    const qualifications = extractQualifications(role.jobDescription);
    const seniorityLevel = inferSeniority(role.roleTitle);

    return {
        keywords: {
            hardSkills,
            softSkills,
            industryTerms: []
        },
        responsibilities: extractResponsibilities(role.jobDescription),
        qualifications,
        seniorityLevel,
        roleFocus: role.roleTitle,
        notes: [
            `Identified ${hardSkills.length} hard skills, ${softSkills.length} soft skills and ${qualifications.required.length} required qualifications.`,
            `Seniority level inferred as ${seniorityLevel} from the role title.`
        ]
    };
}

export function createJobAnalysisTask(adapter?: IBackendAdapter): TaskSpec<JobAnalysisOutput> {
    return {
        name: JOB_ANALYSIS_TASK,
        dependencies: [],
        schema: JobAnalysisOutputSchema,
        fallback: (context: TaskContext) => analyzeJobFallback(context.role),
        backend: delegateTo(adapter, context => ({
            task: JOB_ANALYSIS_TASK,
            instructions: 'Analyze the job posting. Return keywords {hardSkills, softSkills, industryTerms}, '
                + 'responsibilities (strings), qualifications {required, preferred} (strings, in order of mention), '
                + 'seniorityLevel (junior|mid|senior|executive), roleFocus and notes (strings).',
            input: {
                companyName: context.role.companyName,
                roleTitle: context.role.roleTitle,
                jobDescription: context.role.jobDescription,
                notes: context.role.notes ?? null
            }
        }))
    };
}
