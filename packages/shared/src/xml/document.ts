/**
 * NAS Document Loading
 *
 * Decodes the input with the encoding declared in the XML prolog, checks it
 * for well-formedness and builds a namespace-aware DOM tree.
 */

import { XMLValidator } from 'fast-xml-parser';
import { DOMParser, MIME_TYPE, type Document, type Element } from '@xmldom/xmldom';
import { MalformedInputError } from '../errors';
import { logger } from '../logger';

export type NasInput = string | Uint8Array;

/**
 * Parsed NAS document. Only read during one extraction call.
 */
export interface NasDocument {
  readonly document: Document;
  readonly root: Element;
}

const ENCODING_PATTERN = /^\s*<\?xml[^>]*?encoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

/**
 * Determine the encoding of a byte input: byte order mark first, then the
 * encoding pseudo-attribute of the prolog, then UTF-8.
 */
export function detectEncoding(bytes: Uint8Array): string {
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';

  const head = Buffer.from(bytes.subarray(0, 256)).toString('latin1');
  const match = head.match(ENCODING_PATTERN);
  return match ? match[1].toLowerCase() : 'utf-8';
}

/**
 * Decode the input to a string without byte order mark.
 *
 * @throws MalformedInputError if the declared encoding is unknown or the bytes
 * are not valid in it
 */
export function decodeInput(input: NasInput): string {
  if (typeof input === 'string') {
    return input.startsWith('\uFEFF') ? input.slice(1) : input;
  }

  const encoding = detectEncoding(input);
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(input);
  } catch (error) {
    throw new MalformedInputError(`Cannot decode input as ${encoding}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Parse a NAS document.
 *
 * @throws MalformedInputError if the input is not well-formed XML
 */
export function parseNasDocument(input: NasInput): NasDocument {
  const xml = decodeInput(input);

  const validationResult = XMLValidator.validate(xml);
  if (validationResult !== true) {
    throw new MalformedInputError(`Invalid XML structure: ${validationResult.err.msg}`, {
      line: validationResult.err.line,
      col: validationResult.err.col,
    });
  }

  const parseErrors: string[] = [];
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level === 'warning') {
        logger.debug('XML parser warning', { message });
        return;
      }
      parseErrors.push(message);
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, MIME_TYPE.XML_TEXT);
  } catch (error) {
    throw new MalformedInputError('Invalid XML structure', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (parseErrors.length > 0) {
    throw new MalformedInputError(`Invalid XML structure: ${parseErrors[0]}`);
  }

  const root = document.documentElement;
  if (!root) {
    throw new MalformedInputError('Document has no root element');
  }

  return { document, root };
}
