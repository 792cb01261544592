import { describe, expect, it } from 'vitest';

import { DEFAULT_FORMAT } from '../code/config.js';
import { classifyLine, compileLinePatterns, matchCourse, matchSemester, matchTopic } from '../code/line_classifier.js';
import { courseLine } from './helpers.js';

const patterns = compileLinePatterns(DEFAULT_FORMAT);
const ALL_KINDS = ['semester', 'course', 'topic'] as const;

describe('matchSemester', () => {
    it('turns a term header into a short semester code', () => {
        expect(matchSemester('2023 Fall', patterns)).toEqual({ type: 'semester', semester: 'F23' });
        expect(matchSemester('  2024 Spring', patterns)).toEqual({ type: 'semester', semester: 'S24' });
    });

    it('reads the Sprng misspelling as Spring', () => {
        expect(matchSemester('2025 Sprng', patterns)).toEqual({ type: 'semester', semester: 'S25' });
    });

    it('ignores other terms and text', () => {
        expect(matchSemester('2024 Summer', patterns)).toBeNull();
        expect(matchSemester('Fall 2024', patterns)).toBeNull();
        expect(matchSemester('Transfer', patterns)).toBeNull();
    });
});

describe('matchCourse', () => {
    it('extracts every field of a course line', () => {
        expect(matchCourse('PHY 543   Quantum Mechanics I   3.00   3.00   A   12.000', patterns)).toEqual({
            type: 'course',
            code: 'PHY 543',
            title: 'Quantum Mechanics I',
            creditsAttempted: 3,
            creditsEarned: 3,
            grade: 'A',
            qualityPoints: 12,
        });
    });

    it('normalizes the spacing between department and number', () => {
        expect(matchCourse('EAS    520 Sel Top 3.00 3.00 B+ 9.900', patterns)?.code).toBe('EAS 520');
    });

    it('accepts plus/minus grades and the transfer grade', () => {
        expect(matchCourse(courseLine('PHY 611', 'Stat Mech', 3, 'A-'), patterns)?.grade).toBe('A-');
        expect(matchCourse(courseLine('PHY 571', 'Statistical Mechanics', 3, 'T'), patterns)).toEqual({
            type: 'course',
            code: 'PHY 571',
            title: 'Statistical Mechanics',
            creditsAttempted: 3,
            creditsEarned: 3,
            grade: 'T',
            qualityPoints: 0,
        });
    });

    it('reads two-digit credit values', () => {
        const course = matchCourse('PHY 690   Graduate Thesis   12.00   12.00   A   48.000', patterns);
        expect(course?.creditsEarned).toBe(12);
        expect(course?.title).toBe('Graduate Thesis');
    });

    it('ignores totals and column headers', () => {
        expect(matchCourse('Term Totals:   9.00   9.00   4.000   36.000', patterns)).toBeNull();
        expect(matchCourse('Course  Description  Atmpt  Earn  Grade  Points', patterns)).toBeNull();
        expect(matchCourse('PHY 543   Quantum Mechanics I   3.00   3.00', patterns)).toBeNull();
    });

    it('uses a configured transfer grade token', () => {
        const custom = compileLinePatterns({ ...DEFAULT_FORMAT, transferGrade: 'TR' });
        expect(matchCourse('PHY 571   Stat Mech   3.00   3.00   TR   0.000', custom)?.grade).toBe('TR');
        expect(matchCourse('PHY 571   Stat Mech   3.00   3.00   T   0.000', custom)).toBeNull();
    });
});

describe('matchTopic', () => {
    it('takes the text after the topic marker', () => {
        expect(matchTopic('Course Topic:   Plasma Physics ', patterns)).toEqual({ type: 'topic', topic: 'Plasma Physics' });
    });

    it('returns null without the marker', () => {
        expect(matchTopic('Plasma Physics', patterns)).toBeNull();
    });
});

describe('classifyLine', () => {
    it('only tries the kinds the section accepts', () => {
        const line = courseLine('PHY 543', 'Quantum Mechanics', 3);
        expect(classifyLine(line, [], patterns)).toBeNull();
        expect(classifyLine(line, ['semester', 'topic'], patterns)).toBeNull();
        expect(classifyLine(line, ['course'], patterns)?.type).toBe('course');
    });

    it('gives semester headers priority', () => {
        expect(classifyLine('2024 Fall', ALL_KINDS, patterns)).toEqual({ type: 'semester', semester: 'F24' });
    });

    it('prefers a course match over a topic match on the same line', () => {
        const line = `${courseLine('PHY 543', 'Quantum Mechanics', 3)} Course Topic: Extra`;
        expect(classifyLine(line, ALL_KINDS, patterns)?.type).toBe('course');
    });

    it('returns null for lines that match nothing', () => {
        expect(classifyLine('Program: Physics MS', ALL_KINDS, patterns)).toBeNull();
        expect(classifyLine('', ALL_KINDS, patterns)).toBeNull();
    });
});
