import type { CertifyConfig, CourseRecord, LineEvent, ParseState, PendingBuffer } from './types.js';
import { acceptedKinds, advanceSection, detectMarker } from './sections.js';
import { classifyLine, compileLinePatterns } from './line_classifier.js';
import type { LinePatterns } from './line_classifier.js';
import { asTransferCredit, toCourseRecord, withTopic } from './rules.js';

const EMPTY_BUFFER: PendingBuffer = { state: 'empty' };

function createParseState(): ParseState {
    return {
        section: 'PreRecord',
        semester: '',
        pending: EMPTY_BUFFER,
        ledger: [],
    };
}

// Moves a held record into the ledger as-is. No-op on an empty buffer.
function flushPending(state: ParseState): void {
    if (state.pending.state === 'holding') {
        state.ledger.push(state.pending.record);
    }
    state.pending = EMPTY_BUFFER;
}

function hold(state: ParseState, record: CourseRecord): void {
    state.pending = { state: 'holding', record };
}

function applyEvent(state: ParseState, event: LineEvent, config: CertifyConfig): void {
    switch (event.type) {
        case 'marker':
            flushPending(state);
            state.section = advanceSection(state.section, event.section);
            return;

        case 'semester':
            flushPending(state);
            state.semester = event.semester;
            return;

        case 'course': {
            flushPending(state);
            const record = toCourseRecord(event, state.semester, config.program, config.format);
            if (state.section === 'TransferSection') {
                state.ledger.push(asTransferCredit(record));
            } else if (record.classification === 'Elective') {
                hold(state, record);
            } else {
                state.ledger.push(record);
            }
            return;
        }

        case 'topic':
            // a topic line with nothing held can't be attributed to any course
            if (state.pending.state === 'holding') {
                state.ledger.push(withTopic(state.pending.record, event.topic));
                state.pending = EMPTY_BUFFER;
            }
            return;
    }
}

function applyLine(state: ParseState, line: string, config: CertifyConfig, patterns: LinePatterns): void {
    const marker = detectMarker(line, state.section, config.format);
    if (marker) {
        applyEvent(state, marker, config);
        return;
    }

    const event = classifyLine(line, acceptedKinds(state.section), patterns);
    if (event) {
        applyEvent(state, event, config);
    }
}

/**
 * End of document: anything still held is kept with its placeholder title.
 * A transcript whose graduate record never started has no ledger, even when
 * transfer credit was read before the end.
 */
function finishParse(state: ParseState): CourseRecord[] {
    flushPending(state);
    if (state.section !== 'GraduateRecord') {
        return [];
    }
    return state.ledger;
}

/**
 * Runs the section-gated parser over a transcript's lines in document order
 * and returns the finalized ledger. Lines that match nothing are ignored.
 */
function parseTranscriptLines(lines: Iterable<string>, config: CertifyConfig): CourseRecord[] {
    const patterns = compileLinePatterns(config.format);
    const state = createParseState();
    for (const line of lines) {
        applyLine(state, line, config, patterns);
    }
    return finishParse(state);
}

export { createParseState, flushPending, applyEvent, applyLine, finishParse, parseTranscriptLines };
