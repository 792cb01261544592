import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';

import type { CertifiedTranscript, CourseRecord, ProgramConfig } from './types.js';
import { TOTALS_TITLE, formatCredits, formatStatus, reportFileName } from './utilities.js';

const LEDGER_FIELDS = ['Semester', 'Course Code', 'Title', 'Credits Earned', 'Classification', 'Grade'];
const REQUIREMENT_FIELDS = ['Requirement', 'Value', 'Status'];

interface ReportOptions {
    preparedBy?: string;
}

function compareText(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}

// Classification, then semester, then code. Returns a new array.
function sortLedger(records: readonly CourseRecord[]): CourseRecord[] {
    return [...records].sort((a, b) =>
        compareText(a.classification, b.classification) ||
        compareText(a.semester, b.semester) ||
        compareText(a.code, b.code)
    );
}

function unparse(fields: string[], data: string[][]): string {
    return Papa.unparse({ fields, data }, { newline: '\n' });
}

function buildReportCsv(transcript: CertifiedTranscript, options: ReportOptions = {}): string {
    const { result } = transcript;

    const headerRows: string[][] = [['Certification', result.verdict]];
    if (options.preparedBy) {
        headerRows.push(['Prepared by', options.preparedBy]);
    }
    headerRows.push(['Student Name', transcript.name]);
    // keeps leading zeros when the file is opened in a spreadsheet
    headerRows.push(['Student ID', `="${transcript.id}"`]);
    headerRows.push(['Evaluated At', result.evaluatedAt]);

    const ledgerRows = sortLedger(transcript.records).map(record => [
        record.semester,
        record.code,
        record.title,
        formatCredits(record.creditsEarned),
        record.classification,
        record.grade,
    ]);
    ledgerRows.push(['', '', TOTALS_TITLE, formatCredits(result.totalCredits), '', '']);

    const requirementRows = result.requirements.map(requirement => [
        requirement.label,
        formatCredits(requirement.value),
        formatStatus(requirement.met),
    ]);

    return [
        Papa.unparse(headerRows, { newline: '\n' }),
        unparse(LEDGER_FIELDS, ledgerRows),
        unparse(REQUIREMENT_FIELDS, requirementRows),
    ].join('\n\n') + '\n';
}

// Written whatever the verdict. Returns the path of the report.
async function writeReport(transcript: CertifiedTranscript, outputDir: string, program: ProgramConfig, options: ReportOptions = {}): Promise<string> {
    await fs.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, reportFileName(transcript.name, transcript.id, program.reportSuffix));
    await fs.writeFile(outputPath, buildReportCsv(transcript, options), 'utf-8');
    return outputPath;
}

export { sortLedger, buildReportCsv, writeReport };
export type { ReportOptions };
