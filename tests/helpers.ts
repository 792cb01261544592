import { promises as fs } from 'fs';
import path from 'path';
import Papa from 'papaparse';

import { SUMMARY_FILE } from '../code/summary.js';
import type { SummaryRow } from '../code/summary.js';
import type { Classification, CourseRecord, ExtractedPage } from '../code/types.js';

const GRADE_POINTS: Record<string, number> = {
    'A': 4.0, 'A-': 3.7, 'B+': 3.3, 'B': 3.0, 'B-': 2.7, 'C+': 2.3, 'C': 2.0, 'T': 0.0,
};

// A course line laid out the way the transcripts print it.
function courseLine(code: string, title: string, credits: number, grade = 'A'): string {
    const points = (GRADE_POINTS[grade] ?? 0) * credits;
    return `${code}   ${title}   ${credits.toFixed(2)}   ${credits.toFixed(2)}   ${grade}   ${points.toFixed(3)}`;
}

function makeRecord(code: string, creditsEarned: number, classification: Classification, overrides: Partial<CourseRecord> = {}): CourseRecord {
    return {
        semester: 'F23',
        code,
        title: `${code} title`,
        creditsAttempted: creditsEarned,
        creditsEarned,
        grade: 'A',
        qualityPoints: creditsEarned * 4,
        classification,
        transfer: false,
        ...overrides,
    };
}

function singlePage(lines: string[], identityText = 'Name: Test Student 001\nStudent ID: 99990001'): ExtractedPage {
    return { leftLines: lines, rightLines: [], text: identityText };
}

async function readSummaryRows(outputDir: string): Promise<SummaryRow[]> {
    const content = await fs.readFile(path.join(outputDir, SUMMARY_FILE), 'utf-8');
    return Papa.parse<SummaryRow>(content, { header: true, skipEmptyLines: true }).data;
}

export { courseLine, makeRecord, singlePage, readSummaryRows };
