import type { CertificationResult, CourseRecord, RequirementStatus, Verdict } from './types.js';

const TOTALS_TITLE = 'Total Credits Applied';

// Whole credits print without decimals, anything else with two.
function formatCredits(credits: number): string {
    return Number.isInteger(credits) ? String(credits) : credits.toFixed(2);
}

function formatStatus(met: boolean): 'Verified' | 'Not Met' {
    return met ? 'Verified' : 'Not Met';
}

function verdictEmoji(verdict: Verdict): string {
    switch (verdict) {
        case 'Passed':
            return '✅';
        case 'Failed':
            return '❌';
        case 'Failed-Invalid':
            return '🚫';
    }
}

function stripPunctuation(word: string): string {
    return word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

/**
 * Report file name from a person's name: first initial plus last purely
 * alphabetic word, e.g. "Test Student 001" -> "tstudent_<suffix>.csv".
 * Falls back to the student ID when the name has no usable words.
 */
function reportFileName(name: string, id: string, suffix: string): string {
    const words = name.toLowerCase().split(/\s+/).map(stripPunctuation).filter(Boolean);
    const alphabetic = words.filter(word => /^\p{L}+$/u.test(word));
    const first = words[0];
    const last = alphabetic[alphabetic.length - 1];

    if (!first || !last) {
        return `${id}_${suffix}.csv`;
    }
    return `${first.charAt(0)}${last}_${suffix}.csv`;
}

function renderTable(header: string[], rows: string[][]): string {
    const widths = header.map((cell, column) =>
        Math.max(cell.length, ...rows.map(row => (row[column] ?? '').length))
    );
    const renderRow = (row: string[]) =>
        row.map((cell, column) => cell.padEnd(widths[column] ?? 0)).join('  ').trimEnd();

    return [renderRow(header), ...rows.map(renderRow)].join('\n');
}

function prettyPrintLedger(records: readonly CourseRecord[], totalCredits: number): string {
    const rows = records.map(record => [
        record.semester,
        record.code,
        record.title,
        formatCredits(record.creditsEarned),
        record.classification,
        record.grade,
    ]);
    rows.push(['', '', TOTALS_TITLE, formatCredits(totalCredits), '', '']);
    return renderTable(['Semester', 'Course Code', 'Title', 'Credits Earned', 'Classification', 'Grade'], rows);
}

function prettyPrintRequirements(requirements: readonly RequirementStatus[]): string {
    const rows = requirements.map(requirement => [
        requirement.label,
        formatCredits(requirement.value),
        formatStatus(requirement.met),
    ]);
    return renderTable(['Requirement', 'Value', 'Status'], rows);
}

function prettyPrintCertification(name: string, records: readonly CourseRecord[], result: CertificationResult): string {
    const lines: string[] = [];
    lines.push(`${verdictEmoji(result.verdict)} Certification ${result.verdict.toUpperCase()} for ${name}`);
    lines.push('');
    lines.push('Course Record:');
    lines.push(prettyPrintLedger(records, result.totalCredits));
    lines.push('');
    lines.push('Graduation Requirements:');
    lines.push(prettyPrintRequirements(result.requirements));
    return lines.join('\n');
}

export {
    TOTALS_TITLE,
    formatCredits,
    formatStatus,
    verdictEmoji,
    reportFileName,
    renderTable,
    prettyPrintLedger,
    prettyPrintRequirements,
    prettyPrintCertification
};
