/**
 * Ini-style run configuration
 *
 * Harvests `section.key = value` pairs from the configuration files stored
 * next to a run's logs. Values stay raw strings.
 */

import fs from 'node:fs/promises';
import { IniParseError } from '../errors.js';
import type { ConfigParameter } from '../types.js';

const SECTION_PATTERN = /^\[(?<name>[^\]]+)\]\s*$/;
const OPTION_PATTERN = /^(?<key>[^=:\s][^=:]*?)\s*[=:]\s*(?<value>.*)$/;

/**
 * Parse one ini document into qualified parameters, in file order
 *
 * @throws IniParseError on an option outside a section, a malformed line,
 *   or a section/option declared twice in the same document
 */
export function parseIni(content: string, source?: string): ConfigParameter[] {
  const parameters: ConfigParameter[] = [];
  const sections = new Set<string>();
  const seenKeys = new Set<string>();
  let section: string | null = null;
  let last: ConfigParameter | null = null;

  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    const lineNumber = i + 1;
    const trimmed = raw.trim();

    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      if (trimmed === '') {
        last = null;
      }
      continue;
    }

    // Indented lines continue the previous value
    if (/^\s/.test(raw) && last !== null) {
      last.value = last.value === '' ? trimmed : `${last.value}\n${trimmed}`;
      continue;
    }

    if (trimmed.startsWith('[')) {
      const name = SECTION_PATTERN.exec(trimmed)?.groups?.['name']?.trim();
      if (!name) {
        throw new IniParseError(`Malformed section header: ${trimmed}`, { source, line: lineNumber });
      }
      if (sections.has(name)) {
        throw new IniParseError(`Duplicate section [${name}]`, { source, line: lineNumber });
      }
      sections.add(name);
      section = name;
      last = null;
      continue;
    }

    const groups = OPTION_PATTERN.exec(trimmed)?.groups;
    const key = groups?.['key']?.trim();
    const value = groups?.['value'];
    if (key === undefined || key === '' || value === undefined) {
      throw new IniParseError(`Expected 'key = value' or a [section] header: ${trimmed}`, {
        source,
        line: lineNumber,
      });
    }
    if (section === null) {
      throw new IniParseError(`Option '${key}' appears before any [section] header`, {
        source,
        line: lineNumber,
        suggestion: 'Add a [section] header at the top of the file',
      });
    }

    const parameter = `${section}.${key}`;
    if (seenKeys.has(parameter)) {
      throw new IniParseError(`Duplicate option '${key}' in section [${section}]`, {
        source,
        line: lineNumber,
      });
    }
    seenKeys.add(parameter);

    last = { parameter, value: value.trim() };
    parameters.push(last);
  }

  return parameters;
}

/**
 * Merge parameter lists; a later list overrides an identical qualified key.
 * The result is sorted by parameter name.
 */
export function mergeConfigParameters(lists: readonly (readonly ConfigParameter[])[]): ConfigParameter[] {
  const merged = new Map<string, string>();
  for (const list of lists) {
    for (const { parameter, value } of list) {
      merged.set(parameter, value);
    }
  }
  return [...merged.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([parameter, value]) => ({ parameter, value }));
}

/**
 * Read and merge ini files in the given order (last file wins)
 */
export async function harvestConfig(files: readonly string[]): Promise<ConfigParameter[]> {
  const lists: ConfigParameter[][] = [];
  for (const file of files) {
    const content = await fs.readFile(file, 'utf8');
    lists.push(parseIni(content, file));
  }
  return mergeConfigParameters(lists);
}
