import type { Classification, CourseLine, CourseRecord, ProgramConfig, TranscriptFormat } from './types.js';

const LEVEL_REGEX = /\b(\d{3})\b/;

// First 3-digit run in the code, e.g. 543 for "PHY 543". Null when there is none.
function getCourseLevel(code: string): number | null {
    const match = LEVEL_REGEX.exec(code);
    return match?.[1] ? Number.parseInt(match[1], 10) : null;
}

function departmentOf(code: string): string {
    return code.split(/\s+/)[0] ?? '';
}

function classifyCourse(code: string, program: ProgramConfig): Classification {
    if (program.nonCoreElectives.includes(code)) {
        return 'Elective';
    }
    if (departmentOf(code) === program.homeDepartment) {
        return program.researchCourses.includes(code) ? 'Research' : 'Core';
    }
    return 'Invalid';
}

function isTransferGrade(grade: string, format: TranscriptFormat): boolean {
    return grade === format.transferGrade;
}

/**
 * Turns a matched course line into a ledger record.
 *
 * Whitelisted electives get the special-topics placeholder as their title; a
 * following topic line may still refine it. Transfer grades carry no quality points.
 */
function toCourseRecord(line: CourseLine, semester: string, program: ProgramConfig, format: TranscriptFormat): CourseRecord {
    const classification = classifyCourse(line.code, program);
    const transfer = isTransferGrade(line.grade, format);

    return {
        semester,
        code: line.code,
        title: classification === 'Elective' ? program.specialTopicsTitle : line.title,
        creditsAttempted: line.creditsAttempted,
        creditsEarned: Math.max(0, line.creditsEarned),
        grade: line.grade,
        qualityPoints: transfer ? 0 : line.qualityPoints,
        classification,
        transfer,
    };
}

function withTopic(record: CourseRecord, topic: string): CourseRecord {
    return { ...record, title: `Special Topics: ${topic}` };
}

function asTransferCredit(record: CourseRecord): CourseRecord {
    return { ...record, title: `Transfer: ${record.title}`, qualityPoints: 0, transfer: true };
}

export { getCourseLevel, departmentOf, classifyCourse, isTransferGrade, toCourseRecord, withTopic, asTransferCredit };
