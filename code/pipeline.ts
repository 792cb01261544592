import path from 'path';

import type { CertifyConfig, ExtractedPage, TranscriptOutcome } from './types.js';
import { parseTranscriptLines } from './assembler.js';
import { extractIdentity } from './identity.js';
import { pageLinesInOrder } from './layout.js';
import { certifyLedger } from './evaluator.js';

type PageExtractor = (source: string) => Promise<ExtractedPage[]>;

/**
 * Parses and certifies one transcript from already-extracted pages.
 * Missing identity or an empty ledger skip the transcript instead of failing it.
 */
function certifyExtractedTranscript(source: string, pages: ExtractedPage[], config: CertifyConfig, now: Date = new Date()): TranscriptOutcome {
    const { name, id } = extractIdentity(pages);
    if (!name || !id) {
        const missing = [!name && 'name', !id && 'student ID'].filter(Boolean).join(' and ');
        return {
            status: 'skipped',
            source,
            reason: 'identity-not-found',
            message: `Could not extract student ${missing} from ${path.basename(source)}`,
        };
    }

    const records = parseTranscriptLines(pageLinesInOrder(pages), config);
    if (records.length === 0) {
        return {
            status: 'skipped',
            source,
            reason: 'empty-ledger',
            message: `No graduate course records found in ${path.basename(source)}`,
        };
    }

    return {
        status: 'certified',
        source,
        name,
        id,
        records,
        result: certifyLedger(records, config.program, now),
    };
}

async function certifyTranscriptFile(source: string, extract: PageExtractor, config: CertifyConfig): Promise<TranscriptOutcome> {
    let pages: ExtractedPage[];
    try {
        pages = await extract(source);
    } catch (error) {
        return {
            status: 'skipped',
            source,
            reason: 'extraction-failed',
            message: `Could not extract text from ${path.basename(source)}: ${error instanceof Error ? error.message : String(error)}`,
        };
    }
    return certifyExtractedTranscript(source, pages, config);
}

export { certifyExtractedTranscript, certifyTranscriptFile };
export type { PageExtractor };
