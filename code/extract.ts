import { promises as fs } from 'fs';
import { createRequire } from 'module';
import { pathToFileURL } from 'url';
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { ExtractedPage } from './types.js';
import { layoutPage } from './layout.js';
import type { PositionedText } from './layout.js';

const requireFromHere = createRequire(import.meta.url);

function configurePdfJsWorker(): void {
    if (GlobalWorkerOptions.workerSrc) {
        return;
    }
    const workerPath = requireFromHere.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs');
    GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).href;
}

/**
 * Reads a transcript PDF and returns, per page, the left and right column
 * lines plus the whole-page text. Throws when the file can't be read or
 * holds no text at all.
 */
async function extractTranscriptPages(pdfPath: string): Promise<ExtractedPage[]> {
    configurePdfJsWorker();

    const data = new Uint8Array(await fs.readFile(pdfPath));
    const loadingTask = getDocument({ data, useSystemFonts: true, isEvalSupported: false });
    const pages: ExtractedPage[] = [];

    try {
        const document = await loadingTask.promise;
        for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
            const page = await document.getPage(pageNumber);
            const viewport = page.getViewport({ scale: 1 });
            const content = await page.getTextContent();

            const fragments: PositionedText[] = [];
            for (const item of content.items) {
                if (!('str' in item) || !item.str.trim()) {
                    continue;
                }
                fragments.push({
                    text: item.str,
                    x: item.transform[4] ?? 0,
                    y: item.transform[5] ?? 0,
                    width: item.width,
                });
            }

            pages.push(layoutPage(fragments, viewport.width));
            page.cleanup();
        }
    } finally {
        await loadingTask.destroy();
    }

    if (pages.every(page => !page.text)) {
        throw new Error(`No extractable text in ${pdfPath}`);
    }
    return pages;
}

export { extractTranscriptPages };
