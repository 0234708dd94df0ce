import { SHELL_IDENTIFIER } from './constants.js';
import type { ExtractedFunction, ExtractionResult, ParseDiagnostic } from './types.js';

// ─── Lexer ─────────────────────────────────────────────────────────────────

type Context =
  | { kind: 'normal' }
  | { kind: 'command-subst'; parens: number }
  | { kind: 'backtick' }
  | { kind: 'single-quote' }
  | { kind: 'ansi-quote' }
  | { kind: 'double-quote' }
  | { kind: 'param-expansion' };

export type LexState = Context['kind'] | 'here-doc';

/** Where the next word of a top-level line falls in the shell grammar */
type WordPosition = 'command' | 'argument' | 'function-name';

interface HereDoc {
  token: string;
  stripTabs: boolean;
}

// <<TOKEN, <<-TOKEN, <<'TOKEN', <<"TOKEN", <<\TOKEN
const HEREDOC_OPERATOR = /^<<(-?)[ \t]*(?:'([^']+)'|"([^"]+)"|\\?([A-Za-z_][A-Za-z0-9_]*))/;

// A `#` only opens a comment at the start of a word
const WORD_BREAK = /[\s;&|()<>]/;
const CONTROL_OPERATOR = /[;&|()]/;
const OPEN_BRACE_END = /\s/;
const CLOSE_BRACE_END = /[\s;&|)<>]/;
const BODY_BRACE = /^\{(?:\s|$)/;

// Words after which the next word is still in command position
const COMMAND_PREFIXES = new Set(['!', 'if', 'then', 'else', 'elif', 'while', 'until', 'do', 'time', 'fi', 'done', 'esac']);
const ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*(?:\[[^\]]*\])?\+?=/;

const BASE: Context = { kind: 'normal' };

/**
 * Line-oriented shell lexer that tracks structural brace depth.
 * Contexts nest: quotes, `$(...)`, backticks and `${...}` are pushed and
 * popped, so a quote inside a substitution opens a fresh level. Only a
 * `{` or `}` standing as its own word in command position at the top
 * level changes the depth. Comments and here-document bodies are opaque.
 */
export class ShellLexer {
  private stack: Context[] = [BASE];
  private depth = 0;
  private pending: HereDoc[] = [];
  private active: HereDoc | undefined;
  private position: WordPosition = 'command';
  private wordStart = -1;
  private continued = false;

  get braceDepth(): number {
    return this.depth;
  }

  get currentState(): LexState {
    return this.active ? 'here-doc' : this.top.kind;
  }

  /** True when the next line starts outside any function body, string or here-doc */
  get atTopLevel(): boolean {
    return !this.active && this.stack.length === 1 && this.depth === 0;
  }

  private get top(): Context {
    return this.stack[this.stack.length - 1] ?? BASE;
  }

  private get atBase(): boolean {
    return this.stack.length === 1;
  }

  feedLine(line: string): void {
    if (this.active) {
      this.feedHereDocLine(line);
      return;
    }

    if (this.atBase && !this.continued) this.position = 'command';
    this.continued = false;
    this.wordStart = -1;

    let i = 0;
    while (i < line.length) {
      i = this.step(line, i);
    }
    this.endWord(line, line.length);

    // Here-doc bodies start on the next line
    const kind = this.top.kind;
    if (kind === 'normal' || kind === 'command-subst' || kind === 'backtick') this.activateNextHereDoc();
  }

  private step(line: string, i: number): number {
    const ch = line.charAt(i);
    const ctx = this.top;

    switch (ctx.kind) {
      case 'single-quote':
        if (ch === "'") this.pop();
        return i + 1;

      case 'ansi-quote':
        if (ch === '\\') return i + 2;
        if (ch === "'") this.pop();
        return i + 1;

      case 'double-quote':
        if (ch === '\\') return i + 2;
        if (ch === '"') {
          this.pop();
          return i + 1;
        }
        return this.stepExpansion(line, i) ?? i + 1;

      case 'param-expansion':
        if (ch === '\\') return i + 2;
        if (ch === '}') {
          this.pop();
          return i + 1;
        }
        if (ch === '"') {
          this.stack.push({ kind: 'double-quote' });
          return i + 1;
        }
        return this.stepExpansion(line, i) ?? i + 1;

      default:
        return this.stepCommand(line, i, ctx);
    }
  }

  /** `$(`, `${` and backticks open a nested context wherever they are expanded */
  private stepExpansion(line: string, i: number): number | undefined {
    const ch = line.charAt(i);
    if (ch === '`') {
      this.stack.push({ kind: 'backtick' });
      return i + 1;
    }
    if (ch !== '$') return undefined;
    const next = line.charAt(i + 1);
    if (next === '(') {
      this.stack.push({ kind: 'command-subst', parens: 0 });
      return i + 2;
    }
    if (next === '{') {
      this.stack.push({ kind: 'param-expansion' });
      return i + 2;
    }
    return undefined;
  }

  private stepCommand(line: string, i: number, ctx: Context): number {
    const ch = line.charAt(i);

    if (/\s/.test(ch)) {
      this.endWord(line, i);
      return i + 1;
    }
    if (ch === '#' && (i === 0 || WORD_BREAK.test(line.charAt(i - 1)))) {
      this.endWord(line, i);
      return line.length;
    }

    if (ctx.kind === 'command-subst') {
      if (ch === ')') {
        if (ctx.parens === 0) this.pop();
        else ctx.parens--;
        return i + 1;
      }
      if (ch === '(') ctx.parens++;
    }
    if (ctx.kind === 'backtick' && ch === '`') {
      this.pop();
      return i + 1;
    }

    if (ch === '<' && line.startsWith('<<', i)) {
      this.endWord(line, i);
      return this.feedRedirection(line, i);
    }
    if (ch === '<' || ch === '>') {
      this.endWord(line, i);
      // >&2 and <&0 duplicate a descriptor
      return line.charAt(i + 1) === '&' ? i + 2 : i + 1;
    }
    if (CONTROL_OPERATOR.test(ch)) {
      this.endWord(line, i);
      if (this.atBase) this.position = 'command';
      return i + 1;
    }

    if (this.atBase && this.wordStart < 0 && this.position === 'command') {
      const after = line.charAt(i + 1);
      if (ch === '{' && (after === '' || OPEN_BRACE_END.test(after))) {
        this.depth++;
        return i + 1;
      }
      if (ch === '}' && (after === '' || CLOSE_BRACE_END.test(after))) {
        if (this.depth > 0) this.depth--;
        this.position = 'argument';
        return i + 1;
      }
    }

    if (this.atBase && this.wordStart < 0) this.wordStart = i;

    if (ch === '\\') {
      if (i + 1 >= line.length) this.continued = true;
      return i + 2;
    }
    if (ch === "'") {
      this.stack.push({ kind: i > 0 && line.charAt(i - 1) === '$' ? 'ansi-quote' : 'single-quote' });
      return i + 1;
    }
    if (ch === '"') {
      this.stack.push({ kind: 'double-quote' });
      return i + 1;
    }
    return this.stepExpansion(line, i) ?? i + 1;
  }

  private endWord(line: string, end: number): void {
    if (!this.atBase || this.wordStart < 0) return;
    const word = line.slice(this.wordStart, end);
    this.wordStart = -1;

    if (this.position === 'function-name') {
      this.position = 'command';
    } else if (this.position === 'command') {
      if (word === 'function') this.position = 'function-name';
      else if (!COMMAND_PREFIXES.has(word) && !ASSIGNMENT.test(word)) this.position = 'argument';
    }
  }

  private pop(): void {
    if (this.stack.length > 1) this.stack.pop();
  }

  private feedRedirection(line: string, i: number): number {
    // Here-string
    if (line.startsWith('<<<', i)) return i + 3;

    // Arithmetic shift inside (( ... ))
    const before = line.slice(0, i);
    if (before.lastIndexOf('((') > before.lastIndexOf('))')) return i + 2;

    const match = HEREDOC_OPERATOR.exec(line.slice(i));
    if (!match) return i + 2;

    const token = match[2] ?? match[3] ?? match[4];
    if (token) {
      this.pending.push({ token, stripTabs: match[1] === '-' });
    }
    return i + match[0].length;
  }

  private feedHereDocLine(line: string): void {
    const active = this.active;
    if (!active) return;
    const candidate = active.stripTabs ? line.replace(/^\t+/, '') : line;
    if (candidate === active.token) {
      this.active = undefined;
      this.activateNextHereDoc();
    }
  }

  private activateNextHereDoc(): void {
    this.active = this.pending.shift();
  }
}

// ─── Declarations ──────────────────────────────────────────────────────────

// Anything up to the first character that cannot appear in a word
const NAME = `([^\\s(){}<>;&|#'"=$\`]+)`;
const KEYWORD_DECLARATION = new RegExp(`^\\s*function\\s+${NAME}\\s*(?:\\(\\s*\\))?\\s*(.*)$`);
const PAREN_DECLARATION = new RegExp(`^\\s*${NAME}\\s*\\(\\s*\\)\\s*(.*)$`);

const RESERVED_WORDS = new Set(['if', 'then', 'else', 'elif', 'fi', 'for', 'while', 'until', 'do', 'done', 'case', 'esac', 'select', 'in', 'function', 'time']);

export interface Declaration {
  name: string;
  /** Whether the opening brace is on the declaration line itself */
  braceOnLine: boolean;
}

/**
 * Recognise `name() {`, `function name {` and `function name() {`.
 * The brace may also be left for the next line.
 */
export function parseDeclaration(line: string): Declaration | null {
  const match = KEYWORD_DECLARATION.exec(line) ?? PAREN_DECLARATION.exec(line);
  if (!match) return null;

  const name = match[1] ?? '';
  if (RESERVED_WORDS.has(name)) return null;

  const rest = (match[2] ?? '').trim();
  if (BODY_BRACE.test(rest)) return { name, braceOnLine: true };
  if (rest === '' || rest.startsWith('#')) return { name, braceOnLine: false };
  return null;
}

export function isValidFunctionName(name: string): boolean {
  return SHELL_IDENTIFIER.test(name);
}

// ─── Comments ──────────────────────────────────────────────────────────────

/** Strip the comment marker and exactly one following space */
export function cleanCommentLine(line: string): string {
  const body = line.trimStart().replace(/^#+/, '');
  return (body.startsWith(' ') ? body.slice(1) : body).trimEnd();
}

/** Join a run of raw comment lines into one description, or undefined when blank */
export function joinComments(lines: readonly string[]): string | undefined {
  const joined = lines
    .map(cleanCommentLine)
    .filter((l) => l.length > 0)
    .join(' ');
  return joined.length > 0 ? joined : undefined;
}

// ─── Extraction ────────────────────────────────────────────────────────────

interface OpenFunction {
  name: string;
  startLine: number;
  description?: string;
  valid: boolean;
}

interface PendingDeclaration extends OpenFunction {
  index: number;
}

interface PassState {
  functions: ExtractedFunction[];
  diagnostics: ParseDiagnostic[];
  fileDescription?: string;
  declarationSeen: boolean;
}

/**
 * Scan from `startIndex` to the end of the file. Returns the line index of a
 * declaration whose body never closes, or -1 when everything closed.
 */
function scanPass(lines: readonly string[], startIndex: number, acc: PassState): number {
  const lexer = new ShellLexer();
  let comments: string[] = [];
  let pending: PendingDeclaration | undefined;
  let open: (OpenFunction & { index: number }) | undefined;

  const settleFileDescription = () => {
    if (comments.length > 0 && !acc.declarationSeen && acc.fileDescription === undefined) {
      acc.fileDescription = joinComments(comments);
    }
    comments = [];
  };

  for (let index = startIndex; index < lines.length; index++) {
    const line = lines[index] ?? '';
    const trimmed = line.trim();

    if (lexer.atTopLevel && !open) {
      if (pending) {
        if (trimmed === '' || trimmed.startsWith('#')) continue;
        if (BODY_BRACE.test(trimmed)) {
          open = openBody(pending, acc);
          pending = undefined;
          lexer.feedLine(line);
          if (lexer.braceDepth === 0) open = closeFunction(open, index, acc);
          continue;
        }
        // Not a brace body after all
        pending = undefined;
      }

      if (index === 0 && line.startsWith('#!')) continue;

      if (trimmed.startsWith('#')) {
        comments.push(line);
        lexer.feedLine(line);
        continue;
      }
      if (trimmed === '') {
        settleFileDescription();
        continue;
      }

      const declaration = parseDeclaration(line);
      if (declaration) {
        const description = joinComments(comments);
        comments = [];
        acc.declarationSeen = true;

        const valid = isValidFunctionName(declaration.name);
        const fn: PendingDeclaration = { name: declaration.name, startLine: index + 1, valid, index };
        if (description !== undefined) fn.description = description;

        if (!declaration.braceOnLine) {
          pending = fn;
          continue;
        }
        open = openBody(fn, acc);
        lexer.feedLine(line);
        if (lexer.braceDepth === 0) open = closeFunction(open, index, acc);
        continue;
      }

      settleFileDescription();
      lexer.feedLine(line);
      continue;
    }

    lexer.feedLine(line);
    if (open && lexer.braceDepth === 0 && lexer.currentState !== 'here-doc') {
      open = closeFunction(open, index, acc);
    }
  }

  if (open) return open.index;
  if (pending) {
    acc.diagnostics.push({ kind: 'malformed-function', name: pending.name, line: pending.startLine });
  }
  settleFileDescription();
  return -1;
}

/** A declaration only counts once its body brace is seen */
function openBody(fn: PendingDeclaration, acc: PassState): PendingDeclaration {
  if (!fn.valid) {
    acc.diagnostics.push({ kind: 'invalid-function-name', name: fn.name, line: fn.startLine });
  }
  return fn;
}

function closeFunction(fn: OpenFunction, index: number, acc: PassState): undefined {
  if (fn.valid) {
    const extracted: ExtractedFunction = { name: fn.name, startLine: fn.startLine, endLine: index + 1 };
    if (fn.description !== undefined) extracted.description = fn.description;
    acc.functions.push(extracted);
  }
  return undefined;
}

/**
 * Parse the text of one script into its functions and file-level description.
 * Never throws: unterminated bodies and invalid names become diagnostics and
 * the rest of the file is still scanned.
 */
export function extractFunctions(text: string): ExtractionResult {
  const lines = text.split(/\r?\n/);
  const acc: PassState = { functions: [], diagnostics: [], declarationSeen: false };

  let start = 0;
  while (start < lines.length) {
    const unterminated = scanPass(lines, start, acc);
    if (unterminated < 0) break;

    const line = lines[unterminated] ?? '';
    acc.diagnostics.push({
      kind: 'malformed-function',
      name: parseDeclaration(line)?.name ?? line.trim(),
      line: unterminated + 1,
    });
    start = unterminated + 1;
  }

  const result: ExtractionResult = { functions: acc.functions, diagnostics: acc.diagnostics };
  if (acc.fileDescription !== undefined) result.description = acc.fileDescription;
  return result;
}
