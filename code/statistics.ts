import type { SkipReason, TranscriptOutcome } from './types.js';

interface BatchStatistics {
    totalTranscripts: number;
    certified: number;
    passed: number;
    failed: number;
    failedInvalid: number;
    skipped: Record<SkipReason, number>;
    passPercentage: number; // of certified transcripts
}

function computeBatchStatistics(outcomes: readonly TranscriptOutcome[]): BatchStatistics {
    const stats: BatchStatistics = {
        totalTranscripts: outcomes.length,
        certified: 0,
        passed: 0,
        failed: 0,
        failedInvalid: 0,
        skipped: { 'extraction-failed': 0, 'identity-not-found': 0, 'empty-ledger': 0 },
        passPercentage: 0,
    };

    for (const outcome of outcomes) {
        if (outcome.status === 'skipped') {
            stats.skipped[outcome.reason]++;
            continue;
        }
        stats.certified++;
        switch (outcome.result.verdict) {
            case 'Passed':
                stats.passed++;
                break;
            case 'Failed':
                stats.failed++;
                break;
            case 'Failed-Invalid':
                stats.failedInvalid++;
                break;
        }
    }

    stats.passPercentage = stats.certified > 0 ? Math.round((stats.passed / stats.certified) * 1000) / 10 : 0;
    return stats;
}

function formatBatchStatistics(stats: BatchStatistics): string {
    const skippedTotal = Object.values(stats.skipped).reduce((sum, count) => sum + count, 0);
    return [
        `📊 Statistics:`,
        `   Transcripts processed: ${stats.totalTranscripts}`,
        `   Certified: ${stats.certified}`,
        `   Passed: ${stats.passed} (${stats.passPercentage}%)`,
        `   Failed: ${stats.failed}`,
        `   Failed (unapproved course): ${stats.failedInvalid}`,
        `   Skipped: ${skippedTotal}`,
        `     extraction failed: ${stats.skipped['extraction-failed']}`,
        `     identity not found: ${stats.skipped['identity-not-found']}`,
        `     no usable records: ${stats.skipped['empty-ledger']}`,
    ].join('\n');
}

export { computeBatchStatistics, formatBatchStatistics };
export type { BatchStatistics };
