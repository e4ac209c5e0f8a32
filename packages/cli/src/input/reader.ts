/**
 * Reads resource documents from files or stdin.
 *
 * Input is parsed as YAML, which also accepts JSON, and may hold several
 * documents separated by `---`. Empty documents are skipped.
 *
 * @module input/reader
 */

import { readFile } from 'node:fs/promises';
import { parseAllDocuments } from 'yaml';
import { DecodeError, decodeObject, errorMessage, logger, type TypeMeta } from '@kprint/core';

/**
 * Path that selects standard input.
 */
export const STDIN_PATH = '-';

/**
 * Read all text from a stream.
 */
export async function readStream(stream: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Parse text holding one or more YAML or JSON documents and decode each
 * into a resource object.
 *
 * @param text - Document text
 * @param source - Name used in error messages
 * @throws DecodeError if a document does not parse or decode
 */
export function parseResources(text: string, source: string): TypeMeta[] {
  const documents = parseAllDocuments(text);
  const multiple = documents.length > 1;
  const objects: TypeMeta[] = [];

  for (let index = 0; index < documents.length; index++) {
    const doc = documents[index];
    const location = multiple ? `${source}[${index}]` : source;
    const [syntaxError] = doc.errors;
    if (syntaxError) {
      throw new DecodeError(`unable to parse document: ${syntaxError.message}`, location);
    }

    const data: unknown = doc.toJS();
    if (data === null || data === undefined) {
      logger.debug(`Skipping empty document ${location}`);
      continue;
    }
    objects.push(decodeObject(data, location));
  }

  return objects;
}

/**
 * Read and decode every resource in a file, or in stdin for `-`.
 *
 * @param path - File path or `-`
 * @param stdin - Stream read for `-` (default: process.stdin)
 */
export async function readResources(
  path: string,
  stdin: AsyncIterable<string | Buffer> = process.stdin
): Promise<TypeMeta[]> {
  const source = path === STDIN_PATH ? '<stdin>' : path;
  logger.debug(`Reading resources from ${source}`);

  let text: string;
  try {
    text = path === STDIN_PATH ? await readStream(stdin) : await readFile(path, 'utf-8');
  } catch (error) {
    throw new Error(`unable to read ${source}: ${errorMessage(error)}`, { cause: error });
  }

  return parseResources(text, source);
}
