/**
 * Job listing as a scraping driver hands it over. Every field may be missing or
 * carry the wrong type; only an identifier or a title is needed to keep it.
 */
export interface RawJobRecord {
  id?: string | number | null;
  title?: string;
  company?: string;
  salary?: number | null;
  location?: string;
  skills?: string[];
  description?: string;
  valid_until?: string;
}

/**
 * Job listing after boundary validation: every field present and typed, the
 * identifier resolved.
 */
export interface JobRecord {
  id: string;
  title: string;
  company: string;
  salary?: number;
  location: string;
  skills: string[];
  description: string;
  validUntil: string;
}

export interface ParserManifest {
  id: string;
  name: string;
  version: string;
}

export interface ParseResult {
  jobs: unknown[];
}

/**
 * A swappable collector of job listings. Drivers only promise a finite,
 * already-fetched sequence of job-shaped values.
 */
export interface Parser {
  manifest: ParserManifest;
  parse(): Promise<ParseResult>;
}
