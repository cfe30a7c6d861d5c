import { Fragment, Token, isIdentifier } from "./Fragment.js";
import { renderTokens } from "./Renderer.js";
import {
  InvalidExportNameError,
  NameConflictError,
  UnknownUnitError,
} from "./StitchErrors.js";

interface ExportEntry {
  unit: string;
  fragment: Fragment;
}

/**
 * Build wide table of exported fragments.
 *
 * Entries are write once and never removed. A lookup from a build unit
 * sees exports of the same unit and of its transitive dependencies.
 * Units are added in dependency order, so the unit graph can't contain a cycle.
 */
export class ExportRegistry {
  /** unit name to the set of units visible from it (itself and its transitive dependencies) */
  private units = new Map<string, ReadonlySet<string>>();
  private exports = new Map<string, ExportEntry>();

  /** declare a build unit. Its dependencies must already be declared. */
  addUnit(name: string, dependencies: readonly string[] = []): void {
    if (this.units.has(name)) {
      throw new Error(`build unit '${name}' is already declared`);
    }
    const visible = new Set([name]);
    for (const dep of dependencies) {
      this.visibleFrom(dep).forEach((u) => visible.add(u));
    }
    this.units.set(name, visible);
  }

  hasUnit(name: string): boolean {
    return this.units.has(name);
  }

  /** register an exported fragment, names are unique across the whole build */
  register(unit: string, name: string, fragment: Fragment): void {
    this.visibleFrom(unit);
    if (!isIdentifier(name)) {
      throw new InvalidExportNameError(name, fragment.origin);
    }
    const existing = this.exports.get(name);
    if (existing) {
      throw new NameConflictError(name, existing.fragment.origin, fragment.origin);
    }
    this.exports.set(name, { unit, fragment });
  }

  /** @return the fragment exported under name, if visible from unit */
  lookup(unit: string, name: string): Fragment | undefined {
    const visible = this.visibleFrom(unit);
    const entry = this.exports.get(name);
    if (entry && visible.has(entry.unit)) {
      return entry.fragment;
    }
    return undefined;
  }

  /** @return the unit that exported name, regardless of visibility */
  exportOwner(name: string): string | undefined {
    return this.exports.get(name)?.unit;
  }

  /** all export names, in registration order */
  exportNames(): string[] {
    return [...this.exports.keys()];
  }

  /** @return a copy of the tokens defining an export, for the host to re-emit */
  emitExportDefinition(name: string): Token[] | undefined {
    const entry = this.exports.get(name);
    return entry && [...entry.fragment.tokens];
  }

  /** @return the rendered wgsl text of an export's defining tokens */
  exportDefinitionText(name: string): string | undefined {
    const tokens = this.emitExportDefinition(name);
    return tokens && renderTokens(tokens).text;
  }

  private visibleFrom(unit: string): ReadonlySet<string> {
    const visible = this.units.get(unit);
    if (!visible) {
      throw new UnknownUnitError(unit);
    }
    return visible;
  }
}
