import { Contact, ResumeContent, ResumeEducation, ResumeExperience } from '../types/resume';

type SectionRenderer = (content: ResumeContent) => string[];

const SECTION_ORDER = ['summary', 'experience', 'skills', 'education', 'projects'] as const;

function dateRange(entry: Pick<ResumeExperience, 'startDate' | 'endDate' | 'current'>): string {
    const end = entry.current ? 'Present' : entry.endDate;
    return [entry.startDate, end].filter(part => part).join(' – ');
}

function educationLine(entry: ResumeEducation): string {
    const degree = entry.fieldOfStudy ? `${entry.degree} in ${entry.fieldOfStudy}` : entry.degree;
    const years = [entry.startDate, entry.endDate].filter(part => part).join(' – ');
    return [degree, entry.institution, years, entry.gpa ? `GPA ${entry.gpa}` : '']
        .filter(part => part)
        .join(', ');
}

function contactDetails(contact: Contact): string[] {
    return [contact.email, contact.phone, contact.location, contact.linkedin, contact.website]
        .filter((detail): detail is string => Boolean(detail));
}

// Markdown

const markdownSections: Record<(typeof SECTION_ORDER)[number], SectionRenderer> = {
    summary: content => ['## Summary', '', content.summary, ''],
    experience: content => {
        if (content.experience.length === 0) return [];
        const lines = ['## Experience', ''];
        for (const entry of content.experience) {
            lines.push(`### ${entry.title} | ${entry.company}`);
            const meta = [dateRange(entry), entry.location ?? ''].filter(part => part).join(' | ');
            if (meta) lines.push(`*${meta}*`);
            lines.push('');
            for (const bullet of entry.bullets) {
                lines.push(`- ${bullet}`);
            }
            if (entry.bullets.length > 0) lines.push('');
        }
        return lines;
    },
    skills: content => content.skills.length === 0
        ? []
        : ['## Skills', '', content.skills.join(', '), ''],
    education: content => content.education.length === 0
        ? []
        : ['## Education', '', ...content.education.map(entry => `- ${educationLine(entry)}`), ''],
    projects: content => {
        if (content.projects.length === 0) return [];
        const lines = ['## Projects', ''];
        for (const project of content.projects) {
            const stack = project.technologies.length > 0 ? ` (${project.technologies.join(', ')})` : '';
            const description = project.description ? `: ${project.description}` : '';
            lines.push(`- **${project.name}**${stack}${description}`);
        }
        lines.push('');
        return lines;
    }
};

export function renderMarkdown(content: ResumeContent): string {
    const lines = [`# ${content.contact.name}`];
    const details = contactDetails(content.contact);
    if (details.length > 0) lines.push('', details.join(' | '));
    lines.push('');

    for (const section of SECTION_ORDER) {
        lines.push(...markdownSections[section](content));
    }
    return `${lines.join('\n').trimEnd()}\n`;
}

// HTML

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);
}

const htmlSections: Record<(typeof SECTION_ORDER)[number], SectionRenderer> = {
    summary: content => [`<section class="summary"><h2>Summary</h2><p>${escapeHtml(content.summary)}</p></section>`],
    experience: content => {
        if (content.experience.length === 0) return [];
        const entries = content.experience.map(entry => {
            const meta = [dateRange(entry), entry.location ?? ''].filter(part => part).join(' | ');
            const bullets = entry.bullets.length > 0
                ? `<ul>${entry.bullets.map(bullet => `<li>${escapeHtml(bullet)}</li>`).join('')}</ul>`
                : '';
            return `<article><h3>${escapeHtml(entry.title)} | ${escapeHtml(entry.company)}</h3>`
                + (meta ? `<p class="meta">${escapeHtml(meta)}</p>` : '')
                + `${bullets}</article>`;
        });
        return [`<section class="experience"><h2>Experience</h2>${entries.join('')}</section>`];
    },
    skills: content => content.skills.length === 0
        ? []
        : [`<section class="skills"><h2>Skills</h2><p>${escapeHtml(content.skills.join(', '))}</p></section>`],
    education: content => content.education.length === 0
        ? []
        : [`<section class="education"><h2>Education</h2><ul>${content.education
            .map(entry => `<li>${escapeHtml(educationLine(entry))}</li>`)
            .join('')}</ul></section>`],
    projects: content => content.projects.length === 0
        ? []
        : [`<section class="projects"><h2>Projects</h2><ul>${content.projects
            .map(project => {
                const stack = project.technologies.length > 0 ? ` (${project.technologies.join(', ')})` : '';
                const description = project.description ? `: ${project.description}` : '';
                return `<li><strong>${escapeHtml(project.name)}</strong>${escapeHtml(stack + description)}</li>`;
            })
            .join('')}</ul></section>`]
};

export function renderHtml(content: ResumeContent): string {
    const details = contactDetails(content.contact);
    const header = `<header><h1>${escapeHtml(content.contact.name)}</h1>`
        + (details.length > 0 ? `<p class="contact">${escapeHtml(details.join(' | '))}</p>` : '')
        + '</header>';

    const body = SECTION_ORDER.flatMap(section => htmlSections[section](content));
    return `<div class="resume">${header}${body.join('')}</div>`;
}
