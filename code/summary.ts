import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';

import type { CertifiedTranscript } from './types.js';
import { formatCredits } from './utilities.js';

const SUMMARY_FILE = 'certification_summary.csv';

const SUMMARY_FIELDS = [
    'Student Name',
    'Student ID',
    'Core Credits',
    'Research Applied',
    '400-Level Credits',
    'Total Credits',
    'Certification',
    'Evaluated At',
    'Source',
] as const;

type SummaryRow = Record<(typeof SUMMARY_FIELDS)[number], string>;

function toSummaryRow(transcript: CertifiedTranscript): SummaryRow {
    const { result } = transcript;
    return {
        'Student Name': transcript.name,
        'Student ID': transcript.id,
        'Core Credits': formatCredits(result.coreCredits),
        'Research Applied': formatCredits(result.researchApplied),
        '400-Level Credits': formatCredits(result.level4xxCredits),
        'Total Credits': formatCredits(result.totalCredits),
        'Certification': result.verdict,
        'Evaluated At': result.evaluatedAt,
        'Source': path.basename(transcript.source),
    };
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Appends one row per transcript to the summary CSV in `outputDir`.
 * The header is only written when the file is new; existing rows are left alone.
 */
async function appendSummary(transcripts: readonly CertifiedTranscript[], outputDir: string): Promise<string> {
    const summaryPath = path.join(outputDir, SUMMARY_FILE);
    if (transcripts.length === 0) {
        return summaryPath;
    }

    await fs.mkdir(outputDir, { recursive: true });
    const isNew = !(await fileExists(summaryPath));
    const csv = Papa.unparse(
        { fields: [...SUMMARY_FIELDS], data: transcripts.map(t => SUMMARY_FIELDS.map(field => toSummaryRow(t)[field])) },
        { header: isNew, newline: '\n' }
    );
    await fs.appendFile(summaryPath, csv + '\n', 'utf-8');
    return summaryPath;
}

export { SUMMARY_FILE, SUMMARY_FIELDS, toSummaryRow, appendSummary };
export type { SummaryRow };
