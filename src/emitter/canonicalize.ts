/**
 * Canonicalizer — deterministic formatting of generated TypeScript.
 *
 * Re-prints the emitted text through the TypeScript printer, then puts one
 * blank line between consecutive statements of the file and of every
 * namespace body. Declarations are never reordered.
 *
 * Emitted text that does not parse is a generator defect: it is reported
 * with the location of the first syntax error instead of being written out.
 */

import ts from "typescript";
import type { InternalError } from "../types/errors.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

const DEFAULT_FILE_NAME = "generated.ts";

function parse(text: string, fileName: string): ts.SourceFile {
  return ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.ES2022,
    /* setParentNodes */ true,
    ts.ScriptKind.TS,
  );
}

function firstSyntaxError(
  text: string,
  sourceFile: ts.SourceFile,
): InternalError | undefined {
  const { diagnostics } = ts.transpileModule(text, {
    fileName: sourceFile.fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
  });
  const diagnostic = (diagnostics ?? []).find(
    (d) => d.category === ts.DiagnosticCategory.Error,
  );
  if (diagnostic === undefined) {
    return undefined;
  }
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.start === undefined) {
    return { kind: "internal", message };
  }
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(diagnostic.start);
  const excerpt = text.split("\n")[line];
  return {
    kind: "internal",
    message,
    line: line + 1,
    column: character + 1,
    excerpt: excerpt?.trimEnd(),
  };
}

function hasLeadingComment(statement: ts.Statement, sourceFile: ts.SourceFile): boolean {
  const trivia = sourceFile.text.slice(statement.getFullStart(), statement.getStart(sourceFile, true));
  return trivia.trim().length > 0;
}

/**
 * Collect the 0-based lines that must be preceded by a blank line.
 */
function statementBreaks(sourceFile: ts.SourceFile): Set<number> {
  const breaks = new Set<number>();

  const visit = (statements: ts.NodeArray<ts.Statement>): void => {
    statements.forEach((statement, index) => {
      if (index > 0 || hasLeadingComment(statement, sourceFile)) {
        const start = statement.getStart(sourceFile, true);
        breaks.add(sourceFile.getLineAndCharacterOfPosition(start).line);
      }
      if (
        ts.isModuleDeclaration(statement) &&
        statement.body !== undefined &&
        ts.isModuleBlock(statement.body)
      ) {
        visit(statement.body.statements);
      }
    });
  };

  visit(sourceFile.statements);
  return breaks;
}

function layout(printed: string, fileName: string): string {
  const breaks = statementBreaks(parse(printed, fileName));
  const out: string[] = [];

  printed.split("\n").forEach((raw, index) => {
    const line = raw.trimEnd();
    const previousBlank = out.length === 0 || out[out.length - 1] === "";
    if (breaks.has(index) && !previousBlank) {
      out.push("");
    }
    if (line === "" && previousBlank) {
      return;
    }
    out.push(line);
  });

  while (out.length > 0 && out[out.length - 1] === "") {
    out.pop();
  }
  return out.join("\n") + "\n";
}

/**
 * Format generated source text into its canonical form.
 *
 * Same input, same output, and canonicalize(canonicalize(x)) equals
 * canonicalize(x).
 */
export function canonicalize(
  text: string,
  fileName: string = DEFAULT_FILE_NAME,
): Result<string, InternalError> {
  const sourceFile = parse(text, fileName);
  const syntaxError = firstSyntaxError(text, sourceFile);
  if (syntaxError !== undefined) {
    return err(syntaxError);
  }

  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  return ok(layout(printer.printFile(sourceFile), fileName));
}
