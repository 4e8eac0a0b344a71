// src/core/compile/erase.ts
// Type erasure that leaves every other character where it was.
//
// Type syntax is overwritten with spaces, newlines kept, so line and column of
// the remaining JavaScript match the real file. Syntax that needs emitted code
// (enums, namespaces, parameter properties, decorators, JSX, `<T>x` casts)
// is not erasable; `eraseTypes` returns undefined for it.

import { ts } from "ts-morph";

type Blank = {
  start: number;
  end: number;
  /** A whole statement; leaves a `;` so neighbours do not join */
  statement: boolean;
};

const NOT_ERASABLE = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.EnumDeclaration,
  ts.SyntaxKind.ModuleDeclaration,
  ts.SyntaxKind.ImportEqualsDeclaration,
  ts.SyntaxKind.ExportAssignment,
  ts.SyntaxKind.TypeAssertionExpression,
  ts.SyntaxKind.Decorator,
  ts.SyntaxKind.JsxElement,
  ts.SyntaxKind.JsxSelfClosingElement,
  ts.SyntaxKind.JsxFragment,
]);

const ERASED_MODIFIERS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.PublicKeyword,
  ts.SyntaxKind.PrivateKeyword,
  ts.SyntaxKind.ProtectedKeyword,
  ts.SyntaxKind.ReadonlyKeyword,
  ts.SyntaxKind.OverrideKeyword,
]);

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false;
}

function returnOrValueType(node: ts.Node): ts.TypeNode | undefined {
  if (ts.isParameter(node) || ts.isVariableDeclaration(node) || ts.isPropertyDeclaration(node)) return node.type;
  if (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isConstructorDeclaration(node)
  ) {
    return node.type;
  }
  return undefined;
}

function typeParametersOf(node: ts.Node): ts.NodeArray<ts.Node> | undefined {
  if (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isClassDeclaration(node) ||
    ts.isClassExpression(node)
  ) {
    return node.typeParameters;
  }
  return undefined;
}

function typeArgumentsOf(node: ts.Node): ts.NodeArray<ts.Node> | undefined {
  if (
    ts.isCallExpression(node) ||
    ts.isNewExpression(node) ||
    ts.isTaggedTemplateExpression(node) ||
    ts.isExpressionWithTypeArguments(node)
  ) {
    return node.typeArguments;
  }
  return undefined;
}

function isTypeOnlyStatement(node: ts.Node): boolean {
  if (ts.isInterfaceDeclaration(node) || ts.isTypeAliasDeclaration(node)) return true;
  if (ts.isIndexSignatureDeclaration(node)) return true;
  if (hasModifier(node, ts.SyntaxKind.DeclareKeyword)) return true;
  // Overload signatures
  if ((ts.isFunctionDeclaration(node) || ts.isMethodDeclaration(node) || ts.isConstructorDeclaration(node)) && !node.body) {
    return true;
  }
  if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
    return ts.isImportDeclaration(node) ? node.importClause?.isTypeOnly === true : node.isTypeOnly;
  }
  return false;
}

function isNotErasable(node: ts.Node): boolean {
  if (NOT_ERASABLE.has(node.kind)) return true;
  if (hasModifier(node, ts.SyntaxKind.AbstractKeyword)) return true;
  if (ts.isParameter(node)) {
    if (ts.getModifiers(node)?.length) return true;
    if (ts.isIdentifier(node.name) && node.name.text === "this") return true;
  }
  return false;
}

/**
 * Blank out TypeScript-only syntax in `code`. Returns undefined when the
 * fragment uses syntax that only a full transpile can turn into JavaScript.
 */
export function eraseTypes(code: string): string | undefined {
  const source = ts.createSourceFile("fragment.ts", code, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
  const blanks: Blank[] = [];
  const erased = new Set<ts.Node>();
  let erasable = true;

  const blank = (start: number, end: number, statement = false) => blanks.push({ start, end, statement });

  // `<` sits right before the list, `>` after it, possibly past whitespace.
  const blankAngleList = (list: ts.NodeArray<ts.Node>) => {
    list.forEach((n) => erased.add(n));
    const close = code.indexOf(">", list.end);
    blank(list.pos - 1, close + 1);
  };

  const blankToken = (token: ts.Node | undefined) => {
    if (token) blank(token.getStart(source), token.end);
  };

  const visit = (node: ts.Node): void => {
    if (!erasable || erased.has(node)) return;
    if (isNotErasable(node)) {
      erasable = false;
      return;
    }
    if (isTypeOnlyStatement(node)) {
      blank(node.getStart(source), node.end, true);
      return;
    }
    // Every type reached here has a parent that did not blank it.
    if (ts.isTypeNode(node) && !ts.isExpressionWithTypeArguments(node)) {
      erasable = false;
      return;
    }

    const type = returnOrValueType(node);
    if (type) {
      erased.add(type);
      // The colon ends where the type's leading trivia starts.
      blank(type.pos - 1, type.end);
      // `(a)\n: T => a` would put a line break before the arrow.
      if (ts.isArrowFunction(node) && code.slice(type.pos - 1, type.end).includes("\n")) {
        erasable = false;
        return;
      }
    }

    if (ts.isParameter(node) || ts.isPropertyDeclaration(node) || ts.isMethodDeclaration(node)) {
      blankToken(node.questionToken);
    }
    if (ts.isVariableDeclaration(node) || ts.isPropertyDeclaration(node)) {
      blankToken(node.exclamationToken);
    }

    const typeParameters = typeParametersOf(node);
    if (typeParameters) blankAngleList(typeParameters);
    const typeArguments = typeArgumentsOf(node);
    if (typeArguments) blankAngleList(typeArguments);

    if (ts.isAsExpression(node) || ts.isSatisfiesExpression(node)) {
      erased.add(node.type);
      blank(node.expression.end, node.end);
    }
    if (ts.isNonNullExpression(node)) {
      blank(node.expression.end, node.end);
    }
    if (ts.isHeritageClause(node) && node.token === ts.SyntaxKind.ImplementsKeyword) {
      blank(node.getStart(source), node.end);
      return;
    }
    if (ts.isClassElement(node) && ts.canHaveModifiers(node)) {
      for (const modifier of ts.getModifiers(node) ?? []) {
        if (ERASED_MODIFIERS.has(modifier.kind)) blankToken(modifier);
      }
    }

    ts.forEachChild(node, visit);
  };

  ts.forEachChild(source, visit);
  if (!erasable) return undefined;

  const chars = code.split("");
  for (const { start, end, statement } of blanks) {
    for (let i = start; i < end; i++) {
      if (chars[i] !== "\n" && chars[i] !== "\r") chars[i] = " ";
    }
    if (statement) chars[start] = ";";
  }
  return chars.join("");
}
