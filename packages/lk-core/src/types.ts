// ─── Catalog ───────────────────────────────────────────────────────────────

export interface ScriptFile {
  /** Absolute path of the script as discovered under its root */
  path: string;
  /** File name, used for display and for `lk <script>` lookups */
  displayName: string;
  /** Path relative to the root it was found under */
  relativePath: string;
  root: string;
  description?: string;
  functions: ShellFunction[];
}

export interface ShellFunction {
  /** Stable across runs: derived from the script path and the function name */
  id: string;
  name: string;
  /** `<script display name>:<function name>` */
  qualifiedName: string;
  /** Back-reference to the owning script */
  script: ScriptFile;
  description?: string;
  startLine: number; // 1-based line of the declaration
  endLine: number; // 1-based line of the closing brace
  isPrivate: boolean;
  /** Position in catalog discovery order, used as the final ranking tie-break */
  order: number;
}

export interface Catalog {
  roots: string[];
  scripts: ScriptFile[];
  /** Every function of every script, in discovery order */
  functions: ShellFunction[];
  diagnostics: Diagnostic[];
}

// ─── Diagnostics ───────────────────────────────────────────────────────────

export type SkipReason =
  | 'unreadable-file'
  | 'binary-file'
  | 'empty-file'
  | 'too-large'
  | 'not-executable'
  | 'symlink-cycle';

export type Diagnostic =
  | { kind: 'unreadable-file'; path: string; message: string }
  | { kind: 'binary-file'; path: string }
  | { kind: 'empty-file'; path: string }
  | { kind: 'too-large'; path: string; size: number; limit: number }
  | { kind: 'not-executable'; path: string }
  | { kind: 'symlink-cycle'; path: string; target: string }
  | { kind: 'malformed-function'; path: string; name: string; line: number }
  | { kind: 'invalid-function-name'; path: string; name: string; line: number }
  | { kind: 'name-collision'; name: string; paths: string[] };

/** A diagnostic raised while parsing text, before the owning file is known */
export type ParseDiagnostic =
  | { kind: 'malformed-function'; name: string; line: number }
  | { kind: 'invalid-function-name'; name: string; line: number };

// ─── Extraction ────────────────────────────────────────────────────────────

export interface ExtractedFunction {
  name: string;
  description?: string;
  startLine: number;
  endLine: number;
}

export interface ExtractionResult {
  description?: string;
  functions: ExtractedFunction[];
  diagnostics: ParseDiagnostic[];
}

// ─── Eligibility ───────────────────────────────────────────────────────────

export type EligibilityVerdict =
  | { eligible: true; size: number }
  | { eligible: false; reason: SkipReason; detail?: string; size?: number };

export interface EligibilityOptions {
  maxFileSize?: number;
  executableOnly?: boolean;
}

// ─── Resolution ────────────────────────────────────────────────────────────

export interface RankedCandidate {
  fn: ShellFunction;
  score: number;
  exactName: boolean;
  /** Matched character positions inside `fn.name` */
  nameMatches: number[];
}

// ─── Execution ─────────────────────────────────────────────────────────────

export interface ExecutionResult {
  exitCode: number;
  /** Set when the child was terminated by a signal */
  signal: NodeJS.Signals | null;
  wrapperPath: string;
}

/** Minimal logging surface the core reports through */
export interface CoreLogger {
  warn(message: string): void;
  verbose(message: string): void;
}
