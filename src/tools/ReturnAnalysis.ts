import ts from "typescript";

type FunctionLike = ts.FunctionExpression | ts.ArrowFunction | ts.MethodDeclaration | ts.FunctionDeclaration;

function isFunctionLike(node: ts.Node): node is FunctionLike {
  return ts.isFunctionExpression(node) || ts.isArrowFunction(node) || ts.isMethodDeclaration(node) || ts.isFunctionDeclaration(node);
}

function unwrapStatement(file: ts.SourceFile): ts.Expression | undefined {
  const first = file.statements[0];
  if (file.statements.length !== 1 || !first || !ts.isExpressionStatement(first)) return undefined;
  return ts.isParenthesizedExpression(first.expression) ? first.expression.expression : undefined;
}

function findFunction(source: string): FunctionLike | undefined {
  // `function f() {}` and arrows parse as expressions
  const asExpression = unwrapStatement(ts.createSourceFile("tool.js", `(${source});`, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS));
  if (asExpression && isFunctionLike(asExpression)) return asExpression;

  // method shorthand only parses inside an object literal
  const asMethod = unwrapStatement(ts.createSourceFile("tool.js", `({ ${source} });`, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS));
  if (asMethod && ts.isObjectLiteralExpression(asMethod) && asMethod.properties.length === 1) {
    const member = asMethod.properties[0];
    if (member && ts.isMethodDeclaration(member)) return member;
  }
  return undefined;
}

function returnsValue(body: ts.Node): boolean {
  let result = false;
  const visit = (node: ts.Node): void => {
    if (result) return;
    // returns inside nested functions belong to those functions
    if (isFunctionLike(node) || ts.isClassLike(node)) return;
    if (ts.isReturnStatement(node) && node.expression !== undefined) {
      result = true;
      return;
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(body, visit);
  return result;
}

/**
 * True when the function's own body has a `return <expr>`, or it is an arrow
 * with an expression body. Native or unparsable sources report false.
 */
export function doesFunctionReturnValue(fn: (...args: never[]) => unknown): boolean {
  const source = Function.prototype.toString.call(fn);
  if (/\{\s*\[native code\]\s*\}\s*$/.test(source)) return false;
  const parsed = findFunction(source);
  if (!parsed || !parsed.body) return false;
  if (ts.isArrowFunction(parsed) && !ts.isBlock(parsed.body)) {
    return !ts.isVoidExpression(parsed.body);
  }
  return returnsValue(parsed.body);
}
