/**
 * Source Formatter Tests
 */
import { describe, it, expect } from 'vitest';
import { FormattingError, type GeneratedArtifact } from '@cqlgen/shared';
import { SourceFormatter } from '../formatter.js';

function artifact(content: string): GeneratedArtifact {
  return { kind: 'dao', table: 'notes', path: 'note-dao.gen.ts', content };
}

describe('SourceFormatter', () => {
  const formatter = new SourceFormatter();

  it('should normalize spacing of valid source', () => {
    expect(formatter.format(artifact('const a   =  1;\n')).content).toBe('const a = 1;\n');
  });

  it('should keep comments', () => {
    const formatted = formatter.format(artifact('// Code generated by cqlgen; DO NOT EDIT.\nexport const b = 2;\n'));

    expect(formatted.content).toBe('// Code generated by cqlgen; DO NOT EDIT.\nexport const b = 2;\n');
  });

  it('should report syntax issues with positions', () => {
    const issues = formatter.check('const x = ;\n', 'bad.ts');

    expect(issues[0]).toMatchObject({ line: 1, column: 11, code: 'TS1109' });
  });

  it('should not report type errors', () => {
    expect(formatter.check('const n: number = "text";\n', 'types.ts')).toEqual([]);
  });

  it('should raise a FormattingError carrying the rendered source', () => {
    const source = 'export class Broken {\n';

    try {
      formatter.format(artifact(source));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormattingError);
      if (error instanceof FormattingError) {
        expect(error.source).toBe(source);
        expect(error.code).toBe('E3001');
        expect(error.context.table).toBe('notes');
        expect(error.message.startsWith('Generated DAO for notes is not valid TypeScript:\nnote-dao.gen.ts:')).toBe(true);
      }
    }
  });
});
