import type { LineKind, Section, SectionMarker, TranscriptFormat } from './types.js';

const SECTION_ORDER: readonly Section[] = ['PreRecord', 'TransferSection', 'GraduateRecord'];

// Which line patterns each section lets through to the classifier.
const ACCEPTED_KINDS: Record<Section, readonly LineKind[]> = {
    PreRecord: [],
    TransferSection: ['course'],
    GraduateRecord: ['semester', 'course', 'topic'],
};

function sectionRank(section: Section): number {
    return SECTION_ORDER.indexOf(section);
}

/**
 * Looks for a section marker the current section may still move to.
 * The graduate marker wins when a line carries both tokens.
 */
function detectMarker(line: string, current: Section, format: TranscriptFormat): SectionMarker | null {
    if (current === 'GraduateRecord') {
        return null;
    }
    if (line.includes(format.graduateMarker)) {
        return { type: 'marker', section: 'GraduateRecord' };
    }
    if (current === 'PreRecord' && line.includes(format.transferMarker)) {
        return { type: 'marker', section: 'TransferSection' };
    }
    return null;
}

// No back-edges: a target at or before the current section is ignored.
function advanceSection(current: Section, target: Section): Section {
    return sectionRank(target) > sectionRank(current) ? target : current;
}

function acceptedKinds(section: Section): readonly LineKind[] {
    return ACCEPTED_KINDS[section];
}

export { detectMarker, advanceSection, acceptedKinds };
