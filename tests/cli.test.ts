import { describe, expect, it } from 'vitest';

import { parseCliArgs } from '../code/cli.js';

describe('parseCliArgs', () => {
    it('collects transcripts and options in any order', () => {
        expect(parseCliArgs(['a.pdf', '--output-dir', 'out', 'b.pdf', '--program', 'chm.json'])).toEqual({
            ok: true,
            args: { transcripts: ['a.pdf', 'b.pdf'], outputDir: 'out', programConfigPath: 'chm.json' },
        });
    });

    it('needs at least one transcript', () => {
        expect(parseCliArgs(['--output-dir', 'out'])).toEqual({ ok: false, error: 'No transcripts given' });
        expect(parseCliArgs([])).toEqual({ ok: false, error: 'No transcripts given' });
    });

    it('rejects options without a value', () => {
        expect(parseCliArgs(['a.pdf', '--program'])).toEqual({ ok: false, error: 'Missing value for --program' });
        expect(parseCliArgs(['--output-dir', '--program', 'x.json', 'a.pdf'])).toEqual({ ok: false, error: 'Missing value for --output-dir' });
    });

    it('rejects unknown options', () => {
        expect(parseCliArgs(['--verbose', 'a.pdf'])).toEqual({ ok: false, error: 'Unknown option: --verbose' });
    });
});
