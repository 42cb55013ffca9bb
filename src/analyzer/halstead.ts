/**
 * Halstead metrics over the token stream of a parsed source file.
 *
 * Operands are identifiers and literals (including `this`, `true`,
 * `false`, `null`); operators are every other punctuation token or
 * keyword. Advisory only: no verdict reads these values.
 */

import ts from "typescript";

export interface HalsteadMetrics {
  readonly distinctOperators: number;
  readonly distinctOperands: number;
  readonly totalOperators: number;
  readonly totalOperands: number;
  readonly vocabulary: number;
  readonly length: number;
  readonly volume: number;
  readonly difficulty: number;
  readonly effort: number;
}

const OPERAND_KEYWORDS: ReadonlySet<ts.SyntaxKind> = new Set([
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
  ts.SyntaxKind.ThisKeyword,
]);

function isOperandToken(kind: ts.SyntaxKind): boolean {
  return (
    kind === ts.SyntaxKind.Identifier ||
    kind === ts.SyntaxKind.PrivateIdentifier ||
    (kind >= ts.SyntaxKind.FirstLiteralToken && kind <= ts.SyntaxKind.LastLiteralToken) ||
    (kind >= ts.SyntaxKind.FirstTemplateToken && kind <= ts.SyntaxKind.LastTemplateToken) ||
    OPERAND_KEYWORDS.has(kind)
  );
}

function isOperatorToken(kind: ts.SyntaxKind): boolean {
  return (
    (kind >= ts.SyntaxKind.FirstPunctuation && kind <= ts.SyntaxKind.LastPunctuation) ||
    (kind >= ts.SyntaxKind.FirstKeyword && kind <= ts.SyntaxKind.LastKeyword)
  );
}

export function computeHalstead(
  totalOperators: number,
  totalOperands: number,
  distinctOperators: number,
  distinctOperands: number,
): HalsteadMetrics {
  const vocabulary = distinctOperators + distinctOperands;
  const length = totalOperators + totalOperands;
  const volume = vocabulary > 1 ? length * Math.log2(vocabulary) : 0;
  const difficulty = distinctOperands > 0
    ? (distinctOperators / 2) * (totalOperands / distinctOperands)
    : 0;
  return {
    distinctOperators,
    distinctOperands,
    totalOperators,
    totalOperands,
    vocabulary,
    length,
    volume,
    difficulty,
    effort: difficulty * volume,
  };
}

export function measureHalstead(sourceFile: ts.SourceFile): HalsteadMetrics {
  const operators = new Map<string, number>();
  const operands = new Map<string, number>();
  let totalOperators = 0;
  let totalOperands = 0;

  const visit = (node: ts.Node): void => {
    if (ts.isJSDoc(node)) {
      return;
    }
    const children = node.getChildren(sourceFile);
    if (children.length > 0) {
      for (const child of children) {
        visit(child);
      }
      return;
    }

    const kind = node.kind;
    if (isOperandToken(kind)) {
      const text = node.getText(sourceFile);
      operands.set(text, (operands.get(text) ?? 0) + 1);
      totalOperands += 1;
    } else if (isOperatorToken(kind)) {
      const text = ts.tokenToString(kind) ?? node.getText(sourceFile);
      operators.set(text, (operators.get(text) ?? 0) + 1);
      totalOperators += 1;
    }
  };

  visit(sourceFile);

  return computeHalstead(totalOperators, totalOperands, operators.size, operands.size);
}
