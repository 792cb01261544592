import type { CertificationResult, CourseRecord, CreditTotals, ProgramConfig, RequirementStatus, Verdict } from './types.js';
import { getCourseLevel } from './rules.js';

// A record counts toward totals only when it is not Invalid and its level is known and high enough.
function isCounted(record: CourseRecord, program: ProgramConfig): boolean {
    if (record.classification === 'Invalid') {
        return false;
    }
    const level = getCourseLevel(record.code);
    return level !== null && level >= program.minCountedLevel;
}

function computeCreditTotals(records: readonly CourseRecord[], program: ProgramConfig): CreditTotals {
    let coreCredits = 0;
    let researchCredits = 0;
    let level4xxCredits = 0;
    let totalCredits = 0;

    for (const record of records) {
        if (!isCounted(record, program)) {
            continue;
        }
        const credits = record.creditsEarned;
        totalCredits += credits;
        if (record.classification === 'Core') {
            coreCredits += credits;
        }
        if (record.classification === 'Research') {
            researchCredits += credits;
        }
        const level = getCourseLevel(record.code);
        if (level !== null && level < program.graduateLevel) {
            level4xxCredits += credits;
        }
    }

    return {
        coreCredits,
        researchCredits,
        researchApplied: Math.min(program.thresholds.maxResearchCredits, researchCredits),
        level4xxCredits,
        totalCredits,
    };
}

function evaluateRequirements(totals: CreditTotals, invalidCount: number, program: ProgramConfig): RequirementStatus[] {
    const { minCoreCredits, maxResearchCredits, max400LevelCredits, minTotalCredits } = program.thresholds;
    const bandLabel = `${Math.floor(program.minCountedLevel / 100)}00-Level`;

    return [
        {
            key: 'core',
            label: `≥${minCoreCredits} Core Credits`,
            value: totals.coreCredits,
            met: totals.coreCredits >= minCoreCredits,
        },
        {
            key: 'research',
            label: `≤${maxResearchCredits} Research Credits Applied`,
            value: totals.researchApplied,
            met: totals.researchApplied <= maxResearchCredits,
        },
        {
            key: 'level4xx',
            label: `≤${max400LevelCredits} ${bandLabel} Credits Applied`,
            value: totals.level4xxCredits,
            met: totals.level4xxCredits <= max400LevelCredits,
        },
        {
            key: 'total',
            label: `≥${minTotalCredits} Total Credits`,
            value: totals.totalCredits,
            met: totals.totalCredits >= minTotalCredits,
        },
        {
            key: 'noInvalid',
            label: 'No Unapproved Courses',
            value: invalidCount,
            met: invalidCount === 0,
        },
    ];
}

function decideVerdict(requirements: readonly RequirementStatus[]): Verdict {
    if (requirements.some(r => r.key === 'noInvalid' && !r.met)) {
        return 'Failed-Invalid';
    }
    return requirements.every(r => r.met) ? 'Passed' : 'Failed';
}

/**
 * Aggregates a finalized ledger and applies the program policy.
 * Input records are never modified; the same ledger and clock give the same result.
 */
function certifyLedger(records: readonly CourseRecord[], program: ProgramConfig, now: Date = new Date()): CertificationResult {
    const totals = computeCreditTotals(records, program);
    const invalidCount = records.filter(r => r.classification === 'Invalid').length;
    const requirements = evaluateRequirements(totals, invalidCount, program);

    return {
        ...totals,
        invalidCount,
        requirements,
        verdict: decideVerdict(requirements),
        evaluatedAt: now.toISOString(),
    };
}

export { isCounted, computeCreditTotals, evaluateRequirements, decideVerdict, certifyLedger };
