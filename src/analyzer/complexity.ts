/**
 * Complexity analyzer.
 *
 * Splits a source file into function-level units and scores each with
 * cyclomatic complexity: one plus the number of decision points in the
 * unit's own body. Nested functions are separate units and do not add
 * to their parent.
 *
 * Decision points: if, ?:, for, for-in, for-of, while, do-while, each
 * non-default case clause, catch, and the short-circuit operators
 * &&, ||, ?? (and their assignment forms).
 */

import ts from "typescript";
import type { SourceUnit } from "../types/metrics.js";
import { measureHalstead } from "./halstead.js";
import type { HalsteadMetrics } from "./halstead.js";

export type ComplexityResult =
  | {
      readonly parsed: true;
      readonly units: readonly SourceUnit[];
      readonly maxCc: number;
      readonly meanCc: number;
      readonly halstead: HalsteadMetrics;
    }
  | { readonly parsed: false; readonly error: string };

type FunctionUnit =
  | ts.FunctionDeclaration
  | ts.FunctionExpression
  | ts.ArrowFunction
  | ts.MethodDeclaration
  | ts.ConstructorDeclaration
  | ts.GetAccessorDeclaration
  | ts.SetAccessorDeclaration;

const DECISION_KINDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.IfStatement,
  ts.SyntaxKind.ConditionalExpression,
  ts.SyntaxKind.ForStatement,
  ts.SyntaxKind.ForInStatement,
  ts.SyntaxKind.ForOfStatement,
  ts.SyntaxKind.WhileStatement,
  ts.SyntaxKind.DoStatement,
  ts.SyntaxKind.CaseClause,
  ts.SyntaxKind.CatchClause,
]);

const SHORT_CIRCUIT_OPERATORS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.AmpersandAmpersandToken,
  ts.SyntaxKind.BarBarToken,
  ts.SyntaxKind.QuestionQuestionToken,
  ts.SyntaxKind.AmpersandAmpersandEqualsToken,
  ts.SyntaxKind.BarBarEqualsToken,
  ts.SyntaxKind.QuestionQuestionEqualsToken,
]);

export function scriptKindFor(filePath: string): ts.ScriptKind {
  const lower = filePath.toLowerCase();
  if (lower.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (lower.endsWith(".jsx")) return ts.ScriptKind.JSX;
  if (lower.endsWith(".js") || lower.endsWith(".mjs") || lower.endsWith(".cjs")) {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}

function isFunctionUnit(node: ts.Node): node is FunctionUnit {
  if (
    ts.isFunctionDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    // Overload signatures and abstract members have no body to measure.
    return node.body !== undefined;
  }
  return ts.isFunctionExpression(node) || ts.isArrowFunction(node);
}

function decisionWeight(node: ts.Node): number {
  if (DECISION_KINDS.has(node.kind)) {
    return 1;
  }
  if (ts.isBinaryExpression(node) && SHORT_CIRCUIT_OPERATORS.has(node.operatorToken.kind)) {
    return 1;
  }
  return 0;
}

function propertyNameText(name: ts.PropertyName, sourceFile: ts.SourceFile): string {
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return name.getText(sourceFile);
}

function ownerPrefix(node: ts.Node): string {
  const parent = node.parent;
  if (ts.isClassLike(parent)) {
    return `${parent.name?.text ?? "<class>"}.`;
  }
  return "";
}

function unitName(node: FunctionUnit, sourceFile: ts.SourceFile): string {
  if (ts.isConstructorDeclaration(node)) {
    return `${ownerPrefix(node)}constructor`;
  }
  if (ts.isMethodDeclaration(node) || ts.isGetAccessorDeclaration(node) || ts.isSetAccessorDeclaration(node)) {
    return `${ownerPrefix(node)}${propertyNameText(node.name, sourceFile)}`;
  }
  if ((ts.isFunctionDeclaration(node) || ts.isFunctionExpression(node)) && node.name !== undefined) {
    return node.name.text;
  }

  // Anonymous functions take the name of whatever they are bound to.
  const parent = node.parent;
  if (ts.isVariableDeclaration(parent) && ts.isIdentifier(parent.name)) {
    return parent.name.text;
  }
  if (ts.isPropertyAssignment(parent) || ts.isPropertyDeclaration(parent)) {
    return `${ownerPrefix(parent)}${propertyNameText(parent.name, sourceFile)}`;
  }
  if (
    ts.isBinaryExpression(parent) &&
    parent.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
    parent.right === node
  ) {
    return parent.left.getText(sourceFile);
  }
  return "<anonymous>";
}

function measureUnit(unit: FunctionUnit, sourceFile: ts.SourceFile): SourceUnit {
  let decisions = 0;

  const walk = (node: ts.Node): void => {
    if (isFunctionUnit(node)) {
      return;
    }
    decisions += decisionWeight(node);
    ts.forEachChild(node, walk);
  };
  ts.forEachChild(unit, walk);

  const start = sourceFile.getLineAndCharacterOfPosition(unit.getStart(sourceFile));
  const end = sourceFile.getLineAndCharacterOfPosition(unit.getEnd());

  return {
    name: unitName(unit, sourceFile),
    startLine: start.line + 1,
    endLine: end.line + 1,
    complexity: 1 + decisions,
  };
}

/**
 * Enumerate every function-level unit in source order.
 */
export function collectUnits(sourceFile: ts.SourceFile): readonly SourceUnit[] {
  const units: SourceUnit[] = [];
  const visit = (node: ts.Node): void => {
    if (isFunctionUnit(node)) {
      units.push(measureUnit(node, sourceFile));
    }
    ts.forEachChild(node, visit);
  };
  visit(sourceFile);
  return units;
}

/**
 * Return the first syntax error in `text`, or null when it parses cleanly.
 */
export function findSyntaxError(filePath: string, text: string): string | null {
  const output = ts.transpileModule(text, {
    fileName: filePath,
    reportDiagnostics: true,
    compilerOptions: {
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      target: ts.ScriptTarget.ES2022,
    },
  });

  const first = (output.diagnostics ?? []).find(
    (d) => d.category === ts.DiagnosticCategory.Error,
  );
  if (first === undefined) {
    return null;
  }

  const message = ts.flattenDiagnosticMessageText(first.messageText, " ");
  if (first.file !== undefined && first.start !== undefined) {
    const { line } = first.file.getLineAndCharacterOfPosition(first.start);
    return `line ${line + 1}: ${message}`;
  }
  return message;
}

export function parseSource(filePath: string, text: string): ts.SourceFile {
  return ts.createSourceFile(
    filePath,
    text,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(filePath),
  );
}

/**
 * Measure one file's complexity. A syntax error is returned as an
 * unparsed result, never thrown.
 */
export function analyzeComplexity(filePath: string, text: string): ComplexityResult {
  const syntaxError = findSyntaxError(filePath, text);
  if (syntaxError !== null) {
    return { parsed: false, error: syntaxError };
  }

  const sourceFile = parseSource(filePath, text);
  const units = collectUnits(sourceFile);
  const scores = units.map((u) => u.complexity);
  const maxCc = scores.length > 0 ? Math.max(...scores) : 0;
  const meanCc = scores.length > 0
    ? scores.reduce((sum, s) => sum + s, 0) / scores.length
    : 0;

  return {
    parsed: true,
    units,
    maxCc,
    meanCc,
    halstead: measureHalstead(sourceFile),
  };
}
