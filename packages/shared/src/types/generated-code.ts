/**
 * Generated code types shared by the generation pipeline and the CLI
 */

/**
 * Kind of artifact rendered for a table
 */
export type ArtifactKind = 'dao' | 'dto';

/**
 * A single generated source file
 */
export interface GeneratedArtifact {
  /** Kind of artifact */
  kind: ArtifactKind;

  /** Table the artifact was rendered for */
  table: string;

  /** Path relative to the output root */
  path: string;

  /** Rendered source text */
  content: string;
}

/**
 * Single syntax issue found in rendered source
 */
export interface SourceIssue {
  /** 1-based line number */
  line: number;

  /** 1-based column number */
  column: number;

  /** Diagnostic message */
  message: string;

  /** Diagnostic code (e.g., TS1005) */
  code: string;
}

/**
 * Result of writing generated files
 */
export interface FileWriteResult {
  success: boolean;
  path: string;
  error?: string;
}

export interface BatchFileWriteResult {
  success: boolean;
  written: string[];
  failed: Array<{ path: string; error: string }>;
}
