/**
 * @fileoverview Maintainability oracle backed by ts-morph
 *
 * Scores one TypeScript/JavaScript source with the Visual Studio variant of
 * the maintainability index:
 *
 *   MI = max(0, (171 - 5.2 ln(V) - 0.23 G - 16.2 ln(SLOC)) * 100 / 171)
 *
 * where V is the Halstead volume, G the cyclomatic complexity of the whole
 * file and SLOC the number of lines holding code. An empty file scores 100.
 *
 * The aggregation engine only sees the returned score (and details); any
 * other oracle implementing {@link MaintainabilityOracle} can replace this.
 */

import * as path from 'node:path';
import { Node, Project, ts, type SourceFile } from 'ts-morph';
import type { MeasurementDetails } from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface MaintainabilityResult {
  /** 0-100, higher is better */
  score: number;
  details: MeasurementDetails;
}

export interface MaintainabilityOracle {
  measure(source: string, filePath: string): MaintainabilityResult | Promise<MaintainabilityResult>;
}

interface HalsteadCounts {
  operators: Map<string, number>;
  operands: Map<string, number>;
}

const VIRTUAL_ROOT = '/__measure__';

// ============================================================================
// ORACLE
// ============================================================================

/**
 * Create an oracle that parses each source in a private in-memory project.
 * Sources are removed from the project once scored.
 */
export function createMaintainabilityOracle(): MaintainabilityOracle {
  const project = new Project({
    useInMemoryFileSystem: true,
    compilerOptions: {
      allowJs: true,
      checkJs: false,
      noEmit: true,
      skipLibCheck: true,
    },
    skipAddingFilesFromTsConfig: true,
    skipFileDependencyResolution: true,
  });

  return {
    measure(source: string, filePath: string): MaintainabilityResult {
      const virtualPath = path.posix.join(VIRTUAL_ROOT, path.posix.basename(filePath.replace(/\\/g, '/')));
      const sourceFile = project.createSourceFile(virtualPath, source, { overwrite: true });
      try {
        return measureSourceFile(sourceFile);
      } finally {
        project.removeSourceFile(sourceFile);
      }
    },
  };
}

let sharedOracle: MaintainabilityOracle | null = null;

/**
 * Score one source with a lazily created shared oracle.
 */
export async function computeMaintainability(
  source: string,
  filePath: string
): Promise<MaintainabilityResult> {
  sharedOracle ??= createMaintainabilityOracle();
  return sharedOracle.measure(source, filePath);
}

// ============================================================================
// METRICS
// ============================================================================

export function measureSourceFile(sourceFile: SourceFile): MaintainabilityResult {
  const compilerFile = sourceFile.compilerNode;
  const codeLines = new Set<number>();
  const commentLines = new Set<number>();
  const halstead: HalsteadCounts = { operators: new Map(), operands: new Map() };

  collectTokens(compilerFile, compilerFile, codeLines, commentLines, halstead);

  const linesOfCode = codeLines.size;
  const cyclomaticComplexity = computeCyclomaticComplexity(sourceFile);
  const halsteadVolume = computeHalsteadVolume(halstead);
  const commentsPercentage = linesOfCode > 0 ? (commentLines.size / linesOfCode) * 100 : 0;

  return {
    score: maintainabilityIndex(halsteadVolume, cyclomaticComplexity, linesOfCode),
    details: {
      linesOfCode,
      commentsPercentage,
      cyclomaticComplexity,
      halsteadVolume,
    },
  };
}

export function maintainabilityIndex(
  halsteadVolume: number,
  cyclomaticComplexity: number,
  linesOfCode: number
): number {
  if (linesOfCode === 0) return 100;

  const volumeTerm = halsteadVolume > 0 ? 5.2 * Math.log(halsteadVolume) : 0;
  const raw = 171 - volumeTerm - 0.23 * cyclomaticComplexity - 16.2 * Math.log(linesOfCode);
  return Math.min(100, Math.max(0, (raw * 100) / 171));
}

function computeHalsteadVolume(counts: HalsteadCounts): number {
  const distinct = counts.operators.size + counts.operands.size;
  if (distinct === 0) return 0;

  let total = 0;
  for (const count of counts.operators.values()) total += count;
  for (const count of counts.operands.values()) total += count;

  return total * Math.log2(distinct);
}

function isJsDocKind(kind: ts.SyntaxKind): boolean {
  return kind >= ts.SyntaxKind.FirstJSDocNode && kind <= ts.SyntaxKind.LastJSDocNode;
}

function isOperandKind(kind: ts.SyntaxKind): boolean {
  return (
    kind === ts.SyntaxKind.Identifier ||
    kind === ts.SyntaxKind.PrivateIdentifier ||
    kind === ts.SyntaxKind.TrueKeyword ||
    kind === ts.SyntaxKind.FalseKeyword ||
    kind === ts.SyntaxKind.NullKeyword ||
    kind === ts.SyntaxKind.ThisKeyword ||
    ts.isLiteralKind(kind) ||
    ts.isTemplateLiteralKind(kind)
  );
}

function bump(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

function markLines(
  file: ts.SourceFile,
  start: number,
  end: number,
  lines: Set<number>
): void {
  const first = file.getLineAndCharacterOfPosition(start).line;
  const last = file.getLineAndCharacterOfPosition(Math.max(start, end - 1)).line;
  for (let line = first; line <= last; line++) {
    lines.add(line);
  }
}

function markComments(
  file: ts.SourceFile,
  ranges: ts.CommentRange[] | undefined,
  commentLines: Set<number>
): void {
  if (!ranges) return;
  for (const range of ranges) {
    markLines(file, range.pos, range.end, commentLines);
  }
}

function collectTokens(
  node: ts.Node,
  file: ts.SourceFile,
  codeLines: Set<number>,
  commentLines: Set<number>,
  halstead: HalsteadCounts
): void {
  if (isJsDocKind(node.kind)) return;

  const children = node.getChildren(file);
  if (children.length > 0) {
    for (const child of children) {
      collectTokens(child, file, codeLines, commentLines, halstead);
    }
    return;
  }

  const text = file.text;
  markComments(file, ts.getLeadingCommentRanges(text, node.pos), commentLines);
  markComments(file, ts.getTrailingCommentRanges(text, node.end), commentLines);

  if (node.kind === ts.SyntaxKind.EndOfFileToken) return;
  if (node.kind === ts.SyntaxKind.JsxTextAllWhiteSpaces) return;

  const start = node.getStart(file);
  if (start >= node.end) return;
  markLines(file, start, node.end, codeLines);

  if (isOperandKind(node.kind)) {
    bump(halstead.operands, node.getText(file));
  } else {
    bump(halstead.operators, ts.tokenToString(node.kind) ?? node.getText(file));
  }
}

function computeCyclomaticComplexity(node: Node): number {
  // Start at 1 (the base path)
  let complexity = 1;

  node.forEachDescendant((n) => {
    // Each decision point adds 1 to complexity
    if (
      Node.isIfStatement(n) ||
      Node.isConditionalExpression(n) || // ternary
      Node.isForStatement(n) ||
      Node.isForOfStatement(n) ||
      Node.isForInStatement(n) ||
      Node.isWhileStatement(n) ||
      Node.isDoStatement(n) ||
      Node.isCatchClause(n)
    ) {
      complexity++;
    }

    // Switch cases (except default) add complexity
    if (Node.isCaseClause(n)) {
      complexity++;
    }

    // Logical operators (&&, ||, ??) add complexity
    if (Node.isBinaryExpression(n)) {
      const op = n.getOperatorToken().getText();
      if (op === '&&' || op === '||' || op === '??') {
        complexity++;
      }
    }
  });

  return complexity;
}
