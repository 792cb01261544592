import path from 'path';

import type { CertifiedTranscript, CertifyConfig, TranscriptOutcome } from './types.js';
import { certifyTranscriptFile } from './pipeline.js';
import type { PageExtractor } from './pipeline.js';
import { sortLedger, writeReport } from './report.js';
import { appendSummary } from './summary.js';
import { prettyPrintCertification } from './utilities.js';
import { computeBatchStatistics, formatBatchStatistics } from './statistics.js';
import type { BatchStatistics } from './statistics.js';

interface BatchOptions {
    outputDir: string;
    preparedBy?: string;
    extract: PageExtractor;
    log?: (message: string) => void;
    warn?: (message: string) => void;
}

interface BatchResult {
    outcomes: TranscriptOutcome[];
    statistics: BatchStatistics;
    summaryPath?: string;
    completed: boolean; // false when the summary could not be written
}

/**
 * Certifies transcripts one after another. A bad transcript is reported and
 * skipped; it never stops the rest of the batch. Summary rows are appended
 * once, after every transcript has been processed.
 */
async function runBatch(sources: readonly string[], config: CertifyConfig, options: BatchOptions): Promise<BatchResult> {
    const log = options.log ?? console.log;
    const warn = options.warn ?? console.error;
    const outcomes: TranscriptOutcome[] = [];
    const certified: CertifiedTranscript[] = [];

    for (let i = 0; i < sources.length; i++) {
        const source = sources[i];
        if (source === undefined) {
            continue;
        }
        log(`\n[${i + 1}/${sources.length}] ${path.basename(source)}`);

        const outcome = await certifyTranscriptFile(source, options.extract, config);
        outcomes.push(outcome);

        if (outcome.status === 'skipped') {
            warn(`⏭️  Skipping (${outcome.reason}): ${outcome.message}`);
            continue;
        }

        certified.push(outcome);
        log(prettyPrintCertification(outcome.name, sortLedger(outcome.records), outcome.result));

        try {
            const reportPath = await writeReport(outcome, options.outputDir, config.program, { preparedBy: options.preparedBy });
            log(`💾 Report saved to: ${reportPath}`);
        } catch (error) {
            warn(`⚠️  Failed to save report for ${outcome.name}: ${error}`);
        }
    }

    const statistics = computeBatchStatistics(outcomes);

    let summaryPath: string | undefined;
    let completed = true;
    try {
        if (certified.length > 0) {
            summaryPath = await appendSummary(certified, options.outputDir);
            log(`\n💾 Summary CSV saved to: ${summaryPath}`);
        }
    } catch (error) {
        warn(`❌ Failed to write summary: ${error}`);
        completed = false;
    }

    log(`\n${formatBatchStatistics(statistics)}`);
    return { outcomes, statistics, summaryPath, completed };
}

export { runBatch };
export type { BatchOptions, BatchResult };
