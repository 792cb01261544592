const USAGE = 'Usage: tsx code/certify.ts [--output-dir <dir>] [--program <config.json>] <transcript1.pdf> [<transcript2.pdf> ...]';

interface CliArgs {
    transcripts: string[];
    outputDir?: string;
    programConfigPath?: string;
}

type CliParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

function parseCliArgs(argv: readonly string[]): CliParseResult {
    const args: CliArgs = { transcripts: [] };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--output-dir' || arg === '--program') {
            const value = argv[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, error: `Missing value for ${arg}` };
            }
            if (arg === '--output-dir') {
                args.outputDir = value;
            } else {
                args.programConfigPath = value;
            }
            i++;
        } else if (arg?.startsWith('--')) {
            return { ok: false, error: `Unknown option: ${arg}` };
        } else if (arg) {
            args.transcripts.push(arg);
        }
    }

    if (args.transcripts.length === 0) {
        return { ok: false, error: 'No transcripts given' };
    }
    return { ok: true, args };
}

export { USAGE, parseCliArgs };
export type { CliArgs, CliParseResult };
