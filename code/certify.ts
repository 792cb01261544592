import { config } from 'dotenv';

import { USAGE, parseCliArgs } from './cli.js';
import { loadCertifyConfig, resolveRuntimeSettings } from './config.js';
import { extractTranscriptPages } from './extract.js';
import { runBatch } from './batch.js';

// Load environment variables
config();

async function main(): Promise<void> {
    const parsed = parseCliArgs(process.argv.slice(2));
    if (!parsed.ok) {
        console.error(`Error: ${parsed.error}`);
        console.error(USAGE);
        process.exit(1);
    }

    const settings = resolveRuntimeSettings(
        { outputDir: parsed.args.outputDir, programConfigPath: parsed.args.programConfigPath },
        process.env
    );
    const certifyConfig = await loadCertifyConfig(settings.programConfigPath);

    console.log(`Loaded ${parsed.args.transcripts.length} transcripts to certify`);
    if (settings.programConfigPath) {
        console.log(`Using program config ${settings.programConfigPath}`);
    }

    const result = await runBatch(parsed.args.transcripts, certifyConfig, {
        outputDir: settings.outputDir,
        preparedBy: settings.preparedBy,
        extract: extractTranscriptPages,
    });

    if (!result.completed) {
        process.exitCode = 1;
    }
    console.log(`\nAll done.`);
}

main().catch(error => {
    console.error(error);
    process.exit(1);
});
