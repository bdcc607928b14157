import { z } from 'zod';
import { ProfileSnapshot } from '../types/profile';
import { TaskContext } from '../types/task';
import { BackendRequest, IBackendAdapter } from '../services/backend.service';

/**
 * Reads a declared dependency's finalized output through its schema.
 * Finalized outputs already conform, so a failure here means the task
 * read a dependency it never declared.
 */
export function dependencyOutput<T>(
    context: TaskContext,
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
    const result = context.dependencies[name];
    if (!result) {
        throw new Error(`Dependency ${name} is not available to this task`);
    }
    return schema.parse(result.output);
}

export function profileSkillNames(profile: ProfileSnapshot): string[] {
    return profile.skills.map(skill => skill.name);
}

export function profileBullets(profile: ProfileSnapshot): string[] {
    return profile.experience.flatMap(entry => [...entry.bullets]);
}

/** Summary and experience bullets: the prose a reviewer reads. */
export function narrativeText(profile: ProfileSnapshot): string {
    return [profile.summary, ...profileBullets(profile)].join('\n');
}

/** Everything the candidate claims: skills, roles, projects and education. */
export function evidenceText(profile: ProfileSnapshot): string {
    return [
        profile.summary,
        ...profileSkillNames(profile),
        ...profile.experience.flatMap(entry => [entry.title, ...entry.bullets]),
        ...profile.projects.flatMap(project => [project.name, project.description, ...project.technologies]),
        ...profile.education.map(entry => [entry.degree, entry.fieldOfStudy ?? ''].join(' '))
    ].join('\n');
}

/** JSON-friendly view of the profile sent to the backend. */
export function profilePayload(profile: ProfileSnapshot): Record<string, unknown> {
    return {
        summary: profile.summary,
        skills: profileSkillNames(profile),
        experience: profile.experience.map(entry => ({
            title: entry.title,
            company: entry.company,
            bullets: entry.bullets
        })),
        education: profile.education.map(entry => ({
            degree: entry.degree,
            fieldOfStudy: entry.fieldOfStudy ?? null,
            institution: entry.institution
        })),
        projects: profile.projects.map(project => ({
            name: project.name,
            description: project.description,
            technologies: project.technologies
        }))
    };
}

/**
 * Builds a task's backend function, or nothing when no adapter is configured.
 */
export function delegateTo(
    adapter: IBackendAdapter | undefined,
    buildRequest: (context: TaskContext) => BackendRequest
): ((context: TaskContext, signal: AbortSignal) => Promise<unknown>) | undefined {
    if (!adapter) {
        return undefined;
    }
    return (context, signal) => adapter.invoke(buildRequest(context), signal);
}
