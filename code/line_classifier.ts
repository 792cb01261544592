import type { CourseLine, LineEvent, LineKind, SemesterHeader, TopicLine, TranscriptFormat } from './types.js';

interface LinePatterns {
    semester: RegExp;
    course: RegExp;
    topicMarker: string;
}

// e.g. "2024 Spring". "Sprng" shows up on some transcripts and means Spring.
const SEMESTER_REGEX = /^\s*(\d{4})\s+(Fall|Spring|Sprng)\b/;

function escapeRegex(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * <DEPT> <NUM> <TITLE> <ATTEMPTED> <EARNED> <GRADE> <POINTS>, e.g.
 *     PHY 543   Quantum Mechanics I   3.00   3.00   A   12.000
 * The grade is a letter grade with optional +/- or the transfer grade token.
 */
function compileLinePatterns(format: TranscriptFormat): LinePatterns {
    const grade = `[A-F][+-]?|${escapeRegex(format.transferGrade)}`;
    return {
        semester: SEMESTER_REGEX,
        course: new RegExp(
            `([A-Z]{3})\\s+(\\d+)\\s+(.+?)\\s+(\\d{1,2}\\.\\d{2})\\s+(\\d{1,2}\\.\\d{2})\\s+(${grade})\\s+(\\d+\\.\\d{3})`
        ),
        topicMarker: format.topicMarker,
    };
}

function matchSemester(line: string, patterns: LinePatterns): SemesterHeader | null {
    const match = patterns.semester.exec(line);
    if (!match?.[1] || !match[2]) {
        return null;
    }
    const year = match[1].slice(-2);
    const term = match[2] === 'Fall' ? 'F' : 'S';
    return { type: 'semester', semester: `${term}${year}` };
}

function matchCourse(line: string, patterns: LinePatterns): CourseLine | null {
    const match = patterns.course.exec(line);
    if (!match) {
        return null;
    }
    const [, dept, number, title, attempted, earned, grade, points] = match;
    if (!dept || !number || !title || !attempted || !earned || !grade || !points) {
        return null;
    }
    return {
        type: 'course',
        code: `${dept} ${number}`,
        title: title.trim(),
        creditsAttempted: Number.parseFloat(attempted),
        creditsEarned: Number.parseFloat(earned),
        grade,
        qualityPoints: Number.parseFloat(points),
    };
}

function matchTopic(line: string, patterns: LinePatterns): TopicLine | null {
    const at = line.lastIndexOf(patterns.topicMarker);
    if (at < 0) {
        return null;
    }
    return { type: 'topic', topic: line.slice(at + patterns.topicMarker.length).trim() };
}

const MATCHERS: Array<[LineKind, (line: string, patterns: LinePatterns) => LineEvent | null]> = [
    ['semester', matchSemester],
    ['course', matchCourse],
    ['topic', matchTopic],
];

// Tries the accepted patterns in priority order; a line yields at most one event.
function classifyLine(line: string, accepted: readonly LineKind[], patterns: LinePatterns): LineEvent | null {
    for (const [kind, matcher] of MATCHERS) {
        if (!accepted.includes(kind)) {
            continue;
        }
        const event = matcher(line, patterns);
        if (event) {
            return event;
        }
    }
    return null;
}

export { compileLinePatterns, classifyLine, matchSemester, matchCourse, matchTopic };
export type { LinePatterns };
