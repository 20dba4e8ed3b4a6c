import fs from 'fs';
import path from 'path';
import { MappingFileError } from './errors';
import { createLogger } from './logger';
import { mappingFileSchema, type EarningsMapping } from './types';

const log = createLogger('mappings');

export const DEFAULT_EARNINGS_MAP_FILE = 'earnings_ukg.json';
export const DEFAULT_CATEGORY_MAP_FILE = 'earnings_to_aon.json';

/** Directories the candidate locations are resolved against. */
export type MappingRoots = {
  cwd: string;
  moduleDir: string;
};

export type MappingLocation = {
  name: string;
  resolve: (filename: string, roots: MappingRoots) => string;
};

/** Tried in order; the first existing file wins. */
export const MAPPING_LOCATIONS: readonly MappingLocation[] = [
  { name: 'working directory', resolve: (file, { cwd }) => path.join(cwd, file) },
  { name: 'working directory/payroll', resolve: (file, { cwd }) => path.join(cwd, 'payroll', file) },
  { name: 'module directory', resolve: (file, { moduleDir }) => path.join(moduleDir, file) },
  { name: 'module directory/payroll', resolve: (file, { moduleDir }) => path.join(moduleDir, 'payroll', file) },
];

const withDefaults = (roots: Partial<MappingRoots> = {}): MappingRoots => ({
  cwd: roots.cwd ?? process.cwd(),
  moduleDir: roots.moduleDir ?? __dirname,
});

const isFile = (candidate: string) => fs.statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;

export function findMappingFile(filename: string, roots?: Partial<MappingRoots>): string | null {
  const resolvedRoots = withDefaults(roots);
  for (const location of MAPPING_LOCATIONS) {
    const candidate = location.resolve(filename, resolvedRoots);
    if (isFile(candidate)) {
      log.debug(`Using ${filename} from ${location.name}: ${candidate}`);
      return candidate;
    }
  }
  return null;
}

/**
 * Loads a code → value mapping. A file that cannot be found yields an empty mapping;
 * a file that exists but is not a JSON object of strings throws MappingFileError.
 */
export function loadMappingFile(filename: string, roots?: Partial<MappingRoots>): EarningsMapping {
  const file = findMappingFile(filename, roots);
  if (!file) {
    log.warn(`Mapping file ${filename} not found; using an empty mapping`);
    return Object.freeze({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MappingFileError(file, `Could not read mapping file ${file}: ${reason}`, { cause: err });
  }

  const parsed = mappingFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new MappingFileError(file, `Mapping file ${file} must be a JSON object of string values`, {
      cause: parsed.error,
    });
  }
  return Object.freeze(parsed.data);
}
