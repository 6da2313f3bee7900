/**
 * Source Formatter
 * Checks rendered output with the TypeScript parser and re-prints it
 */

import ts from 'typescript';
import {
  FormattingError,
  createChildLogger,
  type GeneratedArtifact,
  type SourceIssue,
} from '@cqlgen/shared';

export class SourceFormatter {
  private logger = createChildLogger({ component: 'SourceFormatter' });
  private printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

  /**
   * Syntax issues in `source`; empty when it parses
   */
  check(source: string, fileName: string): SourceIssue[] {
    const output = ts.transpileModule(source, {
      fileName,
      reportDiagnostics: true,
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        module: ts.ModuleKind.ESNext,
      },
    });

    return (output.diagnostics ?? []).map((diagnostic) => this.toIssue(diagnostic));
  }

  /**
   * Format one artifact. Throws FormattingError carrying the rendered text
   * when it is not valid TypeScript.
   */
  format(artifact: GeneratedArtifact): GeneratedArtifact {
    const issues = this.check(artifact.content, artifact.path);

    if (issues.length > 0) {
      this.logger.error({ table: artifact.table, path: artifact.path, issues }, 'Rendered source does not parse');
      const summary = issues
        .map((issue) => `${artifact.path}:${issue.line}:${issue.column} ${issue.code} ${issue.message}`)
        .join('\n');
      throw new FormattingError(`Generated ${artifact.kind.toUpperCase()} for ${artifact.table} is not valid TypeScript:\n${summary}`, artifact.content, {
        table: artifact.table,
        artifact: artifact.path,
        issues,
      });
    }

    const sourceFile = ts.createSourceFile(artifact.path, artifact.content, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
    return { ...artifact, content: this.printer.printFile(sourceFile) };
  }

  formatAll(artifacts: readonly GeneratedArtifact[]): GeneratedArtifact[] {
    return artifacts.map((artifact) => this.format(artifact));
  }

  private toIssue(diagnostic: ts.Diagnostic): SourceIssue {
    const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
    const code = `TS${diagnostic.code}`;

    if (diagnostic.file && diagnostic.start !== undefined) {
      const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
      return { line: line + 1, column: character + 1, message, code };
    }
    return { line: 0, column: 0, message, code };
  }
}
