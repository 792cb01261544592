type Classification = 'Core' | 'Elective' | 'Research' | 'Invalid';

// Sections only ever move forward through this order.
type Section = 'PreRecord' | 'TransferSection' | 'GraduateRecord';

type Verdict = 'Passed' | 'Failed' | 'Failed-Invalid';

// one academic entry, as it ends up in the ledger
interface CourseRecord {
    semester: string; // e.g. "F23", "" if no semester header was seen yet
    code: string; // "DEPT NUM"
    title: string;
    creditsAttempted: number;
    creditsEarned: number;
    grade: string;
    qualityPoints: number;
    classification: Classification;
    transfer: boolean;
}

interface Identity {
    name?: string;
    id?: string;
}

// What the PDF collaborator hands over for one page.
interface ExtractedPage {
    leftLines: string[];
    rightLines: string[];
    text: string; // whole-page text, used for identity lookup
}

interface CourseLine {
    type: 'course';
    code: string;
    title: string;
    creditsAttempted: number;
    creditsEarned: number;
    grade: string;
    qualityPoints: number;
}

interface SemesterHeader {
    type: 'semester';
    semester: string;
}

interface TopicLine {
    type: 'topic';
    topic: string;
}

interface SectionMarker {
    type: 'marker';
    section: Exclude<Section, 'PreRecord'>;
}

type LineEvent = CourseLine | SemesterHeader | TopicLine | SectionMarker;

type LineKind = Exclude<LineEvent['type'], 'marker'>;

// special-topics buffer
type PendingBuffer =
    | { state: 'empty' }
    | { state: 'holding'; record: CourseRecord };

interface ParseState {
    section: Section;
    semester: string;
    pending: PendingBuffer;
    ledger: CourseRecord[];
}

interface PolicyThresholds {
    minCoreCredits: number;
    maxResearchCredits: number;
    max400LevelCredits: number;
    minTotalCredits: number;
}

interface ProgramConfig {
    homeDepartment: string;
    researchCourses: string[];
    nonCoreElectives: string[];
    thresholds: PolicyThresholds;
    minCountedLevel: number; // courses below this level never count
    graduateLevel: number; // upper bound of the capped 4XX band
    specialTopicsTitle: string;
    reportSuffix: string;
}

interface TranscriptFormat {
    graduateMarker: string;
    transferMarker: string;
    topicMarker: string;
    transferGrade: string;
}

interface CertifyConfig {
    program: ProgramConfig;
    format: TranscriptFormat;
}

interface CreditTotals {
    coreCredits: number;
    researchCredits: number;
    researchApplied: number;
    level4xxCredits: number;
    totalCredits: number;
}

type RequirementKey = 'core' | 'research' | 'level4xx' | 'total' | 'noInvalid';

interface RequirementStatus {
    key: RequirementKey;
    label: string;
    value: number;
    met: boolean;
}

interface CertificationResult extends CreditTotals {
    invalidCount: number;
    requirements: RequirementStatus[];
    verdict: Verdict;
    evaluatedAt: string; // ISO 8601 format
}

type SkipReason = 'extraction-failed' | 'identity-not-found' | 'empty-ledger';

interface CertifiedTranscript {
    status: 'certified';
    source: string;
    name: string;
    id: string;
    records: CourseRecord[];
    result: CertificationResult;
}

interface SkippedTranscript {
    status: 'skipped';
    source: string;
    reason: SkipReason;
    message: string;
}

type TranscriptOutcome = CertifiedTranscript | SkippedTranscript;

interface ValidationResult {
    isValid: boolean;
    errors: string[];
}

export type {
    Classification,
    Section,
    Verdict,
    CourseRecord,
    Identity,
    ExtractedPage,
    CourseLine,
    SemesterHeader,
    TopicLine,
    SectionMarker,
    LineEvent,
    LineKind,
    PendingBuffer,
    ParseState,
    PolicyThresholds,
    ProgramConfig,
    TranscriptFormat,
    CertifyConfig,
    CreditTotals,
    RequirementKey,
    RequirementStatus,
    CertificationResult,
    SkipReason,
    CertifiedTranscript,
    SkippedTranscript,
    TranscriptOutcome,
    ValidationResult
};
