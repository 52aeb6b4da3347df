/**
 * TerminologyLoader: parses terminology documents and discovers
 * *.terminology.yaml files below a directory.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { Property } from '../odml/Property.js';
import { PropertyConstructionError } from '../odml/errors.js';
import { Terminology } from './Terminology.js';
import { TerminologyDocumentSchema, TerminologyLoadError } from './types.js';
import type { TerminologyDocument, TerminologyPropertyEntry } from './types.js';

/** Pattern used to match terminology files. */
export const TERMINOLOGY_PATTERN = '.terminology.yaml';

/**
 * Result of loading all terminologies from disk.
 */
export interface TerminologyLoadResult {
  terminologies: Terminology[];
  errors: Array<{ path: string; error: string }>;
}

function toProperty(entry: TerminologyPropertyEntry, document: TerminologyDocument, source: string): Property {
  const mapping = entry.mapping
    ?? (document.baseUri !== undefined ? `${document.baseUri}#${entry.name}` : null);

  let property: Property;
  try {
    property = new Property(entry.name, {
      definition: entry.definition ?? null,
      dependency: entry.dependency ?? null,
      dependencyValue: entry.dependencyValue ?? null,
      type: entry.type ?? null,
      unit: entry.unit ?? null,
      values: entry.values ?? [],
      mapping,
    });
  } catch (err) {
    if (err instanceof PropertyConstructionError) {
      throw new TerminologyLoadError(err.message, source);
    }
    throw err;
  }

  const declared = entry.values?.length ?? 0;
  if (property.valueCount() !== declared) {
    throw new TerminologyLoadError(
      `property '${entry.name}' keeps ${property.valueCount()} of ${declared} values; ` +
      'check for duplicates and for values that do not fit its type',
      source
    );
  }
  return property;
}

/**
 * Parse one terminology document.
 *
 * @param text - YAML source
 * @param source - Name used in error messages (usually the file path)
 * @throws TerminologyLoadError for malformed YAML or an invalid document
 */
export function parseTerminology(text: string, source: string): Terminology {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new TerminologyLoadError(`invalid YAML: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  const parsed = TerminologyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first !== undefined && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new TerminologyLoadError(`invalid terminology structure${where}: ${first?.message ?? 'unknown error'}`, source);
  }

  const document = parsed.data;
  const properties = document.properties.map(entry => toProperty(entry, document, source));
  return new Terminology(document.name, source, properties);
}

/**
 * Recursively find all *.terminology.yaml files in a directory.
 */
async function findTerminologyFiles(dirPath: string, recursive: boolean): Promise<string[]> {
  const files: string[] = [];

  let entries;
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch {
    return files;
  }

  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        files.push(...await findTerminologyFiles(fullPath, recursive));
      }
    } else if (entry.isFile() && entry.name.endsWith(TERMINOLOGY_PATTERN)) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

/**
 * Load all *.terminology.yaml files from a base directory.
 *
 * @param options.basePath - Root directory to search
 * @param options.recursive - Whether to descend into subdirectories (default true)
 */
export async function loadTerminologies(options: {
  basePath: string;
  recursive?: boolean;
}): Promise<TerminologyLoadResult> {
  const recursive = options.recursive ?? true;

  try {
    const stats = await stat(options.basePath);
    if (!stats.isDirectory()) {
      return { terminologies: [], errors: [{ path: options.basePath, error: 'Not a directory' }] };
    }
  } catch {
    return { terminologies: [], errors: [{ path: options.basePath, error: 'Directory does not exist' }] };
  }

  const filePaths = await findTerminologyFiles(options.basePath, recursive);

  const terminologies: Terminology[] = [];
  const errors: TerminologyLoadResult['errors'] = [];

  for (const filePath of filePaths) {
    const relativePath = relative(options.basePath, filePath);
    try {
      const content = await readFile(filePath, 'utf-8');
      terminologies.push(parseTerminology(content, relativePath));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      errors.push({ path: relativePath, error: message });
    }
  }

  return { terminologies, errors };
}
