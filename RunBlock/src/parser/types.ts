/**
 * A fenced code block. Offsets are UTF-8 byte offsets into the document.
 */
export interface Block {
  /** Tag after the opening fence, case preserved; empty when absent */
  readonly language: string;
  /** Body with LF line endings and no trailing newline */
  readonly code: string;
  /** First byte of the opening fence line */
  readonly start: number;
  /** Just past the closing fence line, including its newline when present */
  readonly end: number;
  readonly codeStart: number;
  /** First byte of the closing fence line */
  readonly codeEnd: number;
}
