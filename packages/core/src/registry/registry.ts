/**
 * Package Registry
 *
 * Maps filetype tags to package loaders. Each Model owns its own registry,
 * so extending one model's registry never affects another.
 */

import { ValidationError } from '@gwmodel/utils';
import type { PackageLoader, PackageRole } from '../types/index.js';

/**
 * How the orchestrator should treat a filetype tag
 */
export type FiletypeResolution =
  | { kind: 'package'; loader: PackageLoader }
  | { kind: 'external'; binary: boolean }
  | { kind: 'unknown' };

export interface RegisterOptions {
  /**
   * Replace an existing loader for the same tag instead of failing
   */
  override?: boolean;
}

export class PackageRegistry {
  private loaders = new Map<string, PackageLoader>();

  constructor(loaders: Iterable<PackageLoader> = []) {
    for (const loader of loaders) {
      this.register(loader);
    }
  }

  /**
   * Register a loader under its filetype tag
   *
   * @throws ValidationError if the tag is already registered and override is not set
   */
  register(loader: PackageLoader, options: RegisterOptions = {}): void {
    const tag = loader.filetype.toUpperCase();
    if (!tag) {
      throw new ValidationError('Package loader must declare a filetype');
    }
    if (this.loaders.has(tag) && !options.override) {
      throw new ValidationError(`Package loader for filetype '${tag}' is already registered`, {
        filetype: tag,
      });
    }
    this.loaders.set(tag, loader);
  }

  /**
   * Loader for a filetype tag (case-insensitive), or undefined if unrecognized
   */
  resolve(filetype: string): PackageLoader | undefined {
    return this.loaders.get(filetype.toUpperCase());
  }

  /**
   * Classify a tag: a registered package, an external data file, or unknown
   */
  classify(filetype: string): FiletypeResolution {
    const loader = this.resolve(filetype);
    if (loader) {
      return { kind: 'package', loader };
    }
    const tag = filetype.toUpperCase();
    if (tag.includes('DATA')) {
      return { kind: 'external', binary: tag.includes('BINARY') };
    }
    return { kind: 'unknown' };
  }

  has(filetype: string): boolean {
    return this.loaders.has(filetype.toUpperCase());
  }

  unregister(filetype: string): boolean {
    return this.loaders.delete(filetype.toUpperCase());
  }

  /**
   * Registered tags in registration order
   */
  tags(): string[] {
    return Array.from(this.loaders.keys());
  }

  byRole(role: PackageRole): PackageLoader[] {
    return Array.from(this.loaders.values()).filter((loader) => loader.role === role);
  }

  clone(): PackageRegistry {
    return new PackageRegistry(this.loaders.values());
  }
}
