import { promises as fs } from 'fs';
import { z } from 'zod';

import type { CertifyConfig, ProgramConfig, TranscriptFormat, ValidationResult } from './types.js';

// MS Physics track defaults
const DEFAULT_PROGRAM: ProgramConfig = {
    homeDepartment: 'PHY',
    researchCourses: ['PHY 680', 'PHY 685', 'PHY 690'],
    nonCoreElectives: ['PHY 510', 'EAS 502', 'EAS 520', 'MTH 573'],
    thresholds: {
        minCoreCredits: 15,
        maxResearchCredits: 6,
        max400LevelCredits: 6,
        minTotalCredits: 30,
    },
    minCountedLevel: 400,
    graduateLevel: 500,
    specialTopicsTitle: 'Special Topics in Physics',
    reportSuffix: 'ms_phy_track',
};

const DEFAULT_FORMAT: TranscriptFormat = {
    graduateMarker: 'Beginning of Graduate Record',
    transferMarker: 'Transfer Credit',
    topicMarker: 'Course Topic:',
    transferGrade: 'T',
};

const courseCode = z.string().regex(/^[A-Z]{3} \d+$/, 'Expected a course code like "PHY 680"');
const credits = z.number().nonnegative();

const programOverrideSchema = z.object({
    homeDepartment: z.string().regex(/^[A-Z]{3}$/, 'Expected a 3-letter department prefix'),
    researchCourses: z.array(courseCode),
    nonCoreElectives: z.array(courseCode),
    thresholds: z.object({
        minCoreCredits: credits,
        maxResearchCredits: credits,
        max400LevelCredits: credits,
        minTotalCredits: credits,
    }).strict().partial(),
    minCountedLevel: z.number().int().nonnegative(),
    graduateLevel: z.number().int().nonnegative(),
    specialTopicsTitle: z.string().min(1),
    reportSuffix: z.string().regex(/^[\w-]+$/, 'Only letters, digits, "_" and "-" are allowed'),
}).strict().partial();

const formatOverrideSchema = z.object({
    graduateMarker: z.string().min(1),
    transferMarker: z.string().min(1),
    topicMarker: z.string().min(1),
    transferGrade: z.string().min(1),
}).strict().partial();

const configFileSchema = z.object({
    program: programOverrideSchema,
    format: formatOverrideSchema,
}).strict().partial();

type ConfigOverrides = z.infer<typeof configFileSchema>;

interface RuntimeSettings {
    outputDir: string;
    programConfigPath?: string;
    preparedBy?: string;
}

function defaultConfig(): CertifyConfig {
    return {
        program: {
            ...DEFAULT_PROGRAM,
            researchCourses: [...DEFAULT_PROGRAM.researchCourses],
            nonCoreElectives: [...DEFAULT_PROGRAM.nonCoreElectives],
            thresholds: { ...DEFAULT_PROGRAM.thresholds },
        },
        format: { ...DEFAULT_FORMAT },
    };
}

function validateConfigOverrides(raw: unknown): ValidationResult {
    const parsed = configFileSchema.safeParse(raw);
    if (parsed.success) {
        return { isValid: true, errors: [] };
    }
    return {
        isValid: false,
        errors: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
}

function mergeConfig(base: CertifyConfig, overrides: ConfigOverrides): CertifyConfig {
    const program = overrides.program ?? {};
    return {
        program: {
            ...base.program,
            ...program,
            thresholds: { ...base.program.thresholds, ...program.thresholds },
        },
        format: { ...base.format, ...overrides.format },
    };
}

async function loadCertifyConfig(configPath?: string): Promise<CertifyConfig> {
    const base = defaultConfig();
    if (!configPath) {
        return base;
    }

    const content = await fs.readFile(configPath, 'utf-8');
    const raw: unknown = JSON.parse(content);
    const validation = validateConfigOverrides(raw);
    if (!validation.isValid) {
        throw new Error(`Invalid program config ${configPath}:\n  ${validation.errors.join('\n  ')}`);
    }
    return mergeConfig(base, configFileSchema.parse(raw));
}

// Flags win over environment variables, which win over defaults.
function resolveRuntimeSettings(flags: Partial<RuntimeSettings>, env: NodeJS.ProcessEnv): RuntimeSettings {
    return {
        outputDir: flags.outputDir ?? env.CERTIFY_OUTPUT_DIR ?? 'output',
        programConfigPath: flags.programConfigPath ?? env.CERTIFY_PROGRAM_CONFIG,
        preparedBy: flags.preparedBy ?? env.CERTIFY_PREPARED_BY,
    };
}

export { DEFAULT_PROGRAM, DEFAULT_FORMAT, defaultConfig, validateConfigOverrides, mergeConfig, loadCertifyConfig, resolveRuntimeSettings };
export type { ConfigOverrides, RuntimeSettings };
