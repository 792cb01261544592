import type { ExtractedPage, Identity } from './types.js';

const NAME_REGEX = /^Name:\s+(.+)/;
const ID_REGEX = /^Student ID:\s+(\d+)/;

// First match wins for each field; later pages never overwrite it.
function extractIdentity(pages: Iterable<Pick<ExtractedPage, 'text'>>): Identity {
    const identity: Identity = {};

    for (const page of pages) {
        if (identity.name && identity.id) {
            break;
        }
        for (const rawLine of page.text.split(/\r?\n/)) {
            const line = rawLine.trim();
            if (!identity.name) {
                const name = NAME_REGEX.exec(line)?.[1]?.trim();
                if (name) {
                    identity.name = name;
                }
            }
            if (!identity.id) {
                const id = ID_REGEX.exec(line)?.[1];
                if (id) {
                    identity.id = id;
                }
            }
        }
    }

    return identity;
}

export { extractIdentity };
