import { DuplicateNameError, SpectrumNotFoundError } from './errors.js';
import type { Spectrum } from './types.js';

/**
 * Loaded spectra keyed by display name, in insertion order.
 */
export class SpectrumCollection {
  private readonly byName = new Map<string, Spectrum>();

  add(spectrum: Spectrum): void {
    if (this.byName.has(spectrum.displayName)) {
      throw new DuplicateNameError(spectrum.displayName);
    }
    this.byName.set(spectrum.displayName, spectrum);
  }

  has(displayName: string): boolean {
    return this.byName.has(displayName);
  }

  get(displayName: string): Spectrum | undefined {
    return this.byName.get(displayName);
  }

  /**
   * Remove a spectrum; throws SpectrumNotFoundError if nothing by that name is loaded.
   */
  remove(displayName: string): Spectrum {
    const spectrum = this.byName.get(displayName);
    if (!spectrum) {
      throw new SpectrumNotFoundError(`spectrum ${displayName}`);
    }
    this.byName.delete(displayName);
    return spectrum;
  }

  list(): Spectrum[] {
    return [...this.byName.values()];
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  get size(): number {
    return this.byName.size;
  }

  clear(): void {
    this.byName.clear();
  }
}
