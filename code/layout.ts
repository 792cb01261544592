import type { ExtractedPage } from './types.js';

interface PositionedText {
    text: string;
    x: number;
    y: number; // PDF user space: larger y is higher up the page
    width: number;
}

const Y_LINE_TOLERANCE = 2;
const X_GAP_SPACE_THRESHOLD = 1.5;

// Joins the fragments of one visual line left to right.
function joinLineFragments(fragments: PositionedText[]): string {
    const ordered = [...fragments].sort((a, b) => a.x - b.x);
    let text = '';
    let previousEnd: number | null = null;

    for (const fragment of ordered) {
        const gap = previousEnd === null ? 0 : fragment.x - previousEnd;
        if (text && gap > X_GAP_SPACE_THRESHOLD && !/\s$/.test(text) && !/^\s/.test(fragment.text)) {
            text += ' ';
        }
        text += fragment.text;
        previousEnd = fragment.x + fragment.width;
    }

    return text.replace(/\s+/g, ' ').trim();
}

/**
 * Walks fragments from the top of the page down. A fragment joins the current
 * line while it sits within the tolerance of that line's baseline (the y of
 * its first fragment); otherwise it starts a new line.
 */
function groupIntoLines(fragments: PositionedText[]): string[] {
    const ordered = fragments.filter(f => f.text.trim()).sort((a, b) => b.y - a.y);
    const lines: PositionedText[][] = [];
    let current: PositionedText[] = [];
    let baseline = 0;

    for (const fragment of ordered) {
        if (current.length > 0 && baseline - fragment.y <= Y_LINE_TOLERANCE) {
            current.push(fragment);
            continue;
        }
        if (current.length > 0) {
            lines.push(current);
        }
        current = [fragment];
        baseline = fragment.y;
    }
    if (current.length > 0) {
        lines.push(current);
    }

    return lines.map(joinLineFragments).filter(line => line.length > 0);
}

/**
 * Splits a page's text at its horizontal midpoint into a left and a right
 * column, and also keeps the whole page as plain text for identity lookup.
 */
function layoutPage(fragments: PositionedText[], pageWidth: number): ExtractedPage {
    const midpoint = pageWidth / 2;
    const left = fragments.filter(f => f.x < midpoint);
    const right = fragments.filter(f => f.x >= midpoint);

    return {
        leftLines: groupIntoLines(left),
        rightLines: groupIntoLines(right),
        text: groupIntoLines(fragments).join('\n'),
    };
}

// Reading order of the course lines: each page's left column, then its right column.
function pageLinesInOrder(pages: Iterable<ExtractedPage>): string[] {
    const lines: string[] = [];
    for (const page of pages) {
        lines.push(...page.leftLines, ...page.rightLines);
    }
    return lines;
}

export { layoutPage, groupIntoLines, joinLineFragments, pageLinesInOrder };
export type { PositionedText };
