import { SectionType } from './types';
import type { SectionRules } from './types';

/**
 * 各分区的标题关键词、内容特征词、插入模板和关键词配额。
 * 模板按长度递增排列，{kw} 为关键词占位符。
 */
export const DEFAULT_SECTION_RULES: SectionRules = {
    [SectionType.SUMMARY]: {
        headers: ['summary', 'professional summary', 'career summary', 'profile', 'professional profile', 'overview', 'objective', 'career objective', 'about me'],
        contentHints: [],
        templates: [
            'Skilled in {kw}.',
            'Experienced with {kw} across the full delivery cycle.',
            'Brings practical expertise in {kw} to cross-functional product work.'
        ],
        budget: 3
    },
    [SectionType.SKILLS]: {
        headers: ['skills', 'technical skills', 'core skills', 'key skills', 'competencies', 'core competencies', 'technologies', 'tech stack'],
        contentHints: [],
        templates: [
            'Proficient in {kw}.',
            'Hands-on experience with {kw}.',
            'Working knowledge of {kw} in production environments.'
        ],
        budget: 8
    },
    [SectionType.EXPERIENCE]: {
        headers: ['experience', 'work experience', 'professional experience', 'employment', 'employment history', 'work history', 'career history'],
        contentHints: ['managed', 'led', 'coordinated', 'supervised', 'oversaw', 'mentored'],
        templates: [
            'Utilized {kw} for development.',
            'Applied {kw} to deliver production features.',
            'Leveraged {kw} to improve reliability and delivery speed across services.'
        ],
        budget: 5
    },
    [SectionType.PROJECTS]: {
        headers: ['projects', 'personal projects', 'key projects', 'academic projects', 'selected projects'],
        contentHints: ['developed', 'built', 'implemented', 'designed', 'created', 'prototyped'],
        templates: [
            'Built with {kw}.',
            'Implemented core features using {kw}.',
            'Integrated {kw} to extend the functionality and scalability of the project.'
        ],
        budget: 4
    },
    [SectionType.EDUCATION]: {
        headers: ['education', 'academic background', 'academics', 'qualifications'],
        contentHints: ['degree', 'university', 'college', 'bachelor', 'master', 'gpa', 'diploma'],
        templates: [],
        budget: 0
    },
    [SectionType.AWARDS]: {
        headers: ['awards', 'honors', 'achievements', 'accomplishments'],
        contentHints: [],
        templates: [],
        budget: 0
    },
    [SectionType.CERTIFICATIONS]: {
        headers: ['certifications', 'certification', 'certificates', 'licenses'],
        contentHints: [],
        templates: [],
        budget: 0
    },
    [SectionType.OTHER]: {
        headers: [],
        contentHints: [],
        templates: [
            'Familiar with {kw}.',
            'Additional exposure to {kw} in day-to-day work.'
        ],
        budget: 2
    }
};

// 按此顺序匹配包含词和内容特征
export const SECTION_ORDER: readonly SectionType[] = [
    SectionType.SUMMARY,
    SectionType.SKILLS,
    SectionType.EXPERIENCE,
    SectionType.PROJECTS,
    SectionType.EDUCATION,
    SectionType.AWARDS,
    SectionType.CERTIFICATIONS
];

// 内容启发式的优先级
export const HINT_ORDER: readonly SectionType[] = [
    SectionType.PROJECTS,
    SectionType.EXPERIENCE,
    SectionType.EDUCATION
];
