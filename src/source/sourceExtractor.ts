import fs from 'node:fs/promises';
import path from 'node:path';
import { DOMParser } from '@xmldom/xmldom';
import { XMLValidator } from 'fast-xml-parser';
import { FormatError, IoError, SourcePosition, errorMessage } from '../util/errors';

/** Marker that opens the embedded designer document. */
export const XML_DECLARATION_MARKER = '<?xml';
/** Marker that ends the designer document; generated code follows it. */
export const DESIGNER_SENTINEL = '#endif';

export type SourceFile = {
  filePath: string;
  text: string;
  sizeBytes: number;
};

export type XmlSegment = {
  xml: string;
  /** Position of the XML declaration within the raw file. */
  start: SourcePosition;
};

export async function readSourceFile(filePath: string): Promise<SourceFile> {
  let buf: Buffer;
  try {
    buf = await fs.readFile(filePath);
  } catch (e) {
    throw new IoError(filePath, `Failed to read orchestration file '${filePath}': ${errorMessage(e)}`, { cause: e });
  }
  return { filePath, text: buf.toString('utf8'), sizeBytes: buf.length };
}

/** 1-based line and column of a character offset. */
export function positionAt(text: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

/**
 * Isolate the designer XML: from the first `<?xml` up to (not including) the first
 * `#endif` after it. Both markers are checked before any XML parsing happens.
 */
export function extractXmlSegment(raw: string, fileLabel: string): XmlSegment {
  const name = path.basename(fileLabel);
  const start = raw.indexOf(XML_DECLARATION_MARKER);
  if (start < 0) {
    throw new FormatError(`Invalid orchestration file '${name}': missing XML declaration`);
  }
  const end = raw.indexOf(DESIGNER_SENTINEL, start);
  if (end < 0) {
    throw new FormatError(`Invalid orchestration file '${name}': missing '${DESIGNER_SENTINEL}' sentinel`);
  }
  return { xml: raw.substring(start, end), start: positionAt(raw, start) };
}

/** Map a position inside the segment back to the raw file. */
function toFilePosition(segment: XmlSegment, line: number, column: number): SourcePosition {
  if (line <= 1) return { line: segment.start.line, column: segment.start.column + column - 1 };
  return { line: segment.start.line + line - 1, column };
}

/** Throws a {@link FormatError} with a file-relative position if the segment is not well formed. */
export function assertWellFormed(segment: XmlSegment, fileLabel: string): void {
  const result = XMLValidator.validate(segment.xml);
  if (result === true) return;
  const { msg, line, col } = result.err;
  const pos = toFilePosition(segment, line, col);
  throw new FormatError(
    `Failed to parse XML in orchestration file '${path.basename(fileLabel)}' at line ${pos.line}, column ${pos.column}: ${msg}`,
    pos,
  );
}

export type LoadDocumentOptions = {
  onWarning?: (message: string) => void;
};

/** Validate, then parse the segment into a DOM document. */
export function loadDesignerDocument(segment: XmlSegment, fileLabel: string, opts: LoadDocumentOptions = {}): Document {
  assertWellFormed(segment, fileLabel);

  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: string) => opts.onWarning?.(msg),
      error: (msg: string) => {
        errors.push(msg);
      },
      fatalError: (msg: string) => {
        errors.push(msg);
      },
    },
  });
  const doc = parser.parseFromString(segment.xml, 'text/xml');
  if (errors.length > 0 || !doc.documentElement) {
    const detail = errors[0] ?? 'no document element';
    throw new FormatError(`Failed to parse XML in orchestration file '${path.basename(fileLabel)}': ${detail}`);
  }
  return doc;
}
