/**
 * SpectrumImportService: one file at a time from raw text into the collection.
 *
 * The single-file import is the unit of failure: in a batch, a file that
 * fails is reported through the shell and the next file is imported.
 */

import type { LocalSpectrumSource } from '../source/LocalSpectrumSource.js';
import { DegenerateDataError, DuplicateNameError, SpectrumError, SpectrumNotFoundError } from './errors.js';
import { SpectrumParser, displayNameOf } from './parser/SpectrumParser.js';
import { FormatSniffer } from './sniffer/FormatSniffer.js';
import type { SpectrumCollection } from './SpectrumCollection.js';
import type { Spectrum, SpectrumShell } from './types.js';

export interface ImportFailure {
  path: string;
  error: string;
  message: string;
}

export interface ImportBatchResult {
  /** Display names added to the collection */
  imported: string[];
  failed: ImportFailure[];
}

export class SpectrumImportService {
  private readonly collection: SpectrumCollection;
  private readonly source: LocalSpectrumSource | undefined;
  private readonly sniffer = new FormatSniffer();
  private readonly parser = new SpectrumParser();

  constructor(collection: SpectrumCollection, source?: LocalSpectrumSource) {
    this.collection = collection;
    this.source = source;
  }

  /**
   * Import raw text under the given path. Throws the typed errors of the core.
   */
  async importContent(sourcePath: string, content: string, shell: SpectrumShell): Promise<Spectrum> {
    const displayName = displayNameOf(sourcePath);
    // checked before sniffing so a duplicate never prompts for a delimiter
    if (this.collection.has(displayName)) {
      throw new DuplicateNameError(displayName);
    }

    const sniffed = await this.sniffer.sniff(content, displayName, shell);
    const spectrum = this.parser.parse(sniffed.rows, sourcePath, { delimiter: sniffed.delimiter });
    this.collection.add(spectrum);

    if (spectrum.yMin === undefined) {
      const warning = new DegenerateDataError(displayName);
      shell.reportError(warning.kind, warning.message);
    }
    return spectrum;
  }

  async importFile(path: string, shell: SpectrumShell): Promise<Spectrum> {
    if (!this.source) {
      throw new SpectrumNotFoundError(`file ${path} (no source directory configured)`);
    }
    const displayName = displayNameOf(path);
    if (this.collection.has(displayName)) {
      throw new DuplicateNameError(displayName);
    }
    const file = await this.source.getFile(path);
    if (!file) {
      throw new SpectrumNotFoundError(`file ${path}`);
    }
    return this.importContent(path, file.content, shell);
  }

  /**
   * Import files strictly one after another.
   *
   * Failures are reported and collected; errors outside the core's own
   * taxonomy (an unreadable file) are reported as format errors.
   */
  async importBatch(paths: readonly string[], shell: SpectrumShell): Promise<ImportBatchResult> {
    const result: ImportBatchResult = { imported: [], failed: [] };

    for (const path of paths) {
      try {
        const spectrum = await this.importFile(path, shell);
        result.imported.push(spectrum.displayName);
      } catch (err) {
        if (err instanceof SpectrumError) {
          shell.reportError(err.kind, err.message);
          result.failed.push({ path, error: err.code, message: err.message });
        } else {
          const message = `${path}: ${err instanceof Error ? err.message : String(err)}`;
          shell.reportError('FormatError', message);
          result.failed.push({ path, error: 'READ_ERROR', message });
        }
      }
    }

    return result;
  }
}
