import { ExportRegistry } from "./ExportRegistry.js";
import { Expanded, expandFragment } from "./Expand.js";
import { Fragment } from "./Fragment.js";
import { StitchError } from "./StitchErrors.js";
import { CheckFailedError, Checker } from "./ValidatorAdapter.js";

export interface ShaderBuildOptions {
  /** validates stitched text (default checkWgsl) */
  checker?: Checker;

  /** recognize reserved #directives (default true) */
  directives?: boolean;
}

export type FragmentFailure = StitchError | CheckFailedError;

export type FragmentResult =
  | { fragment: Fragment; expanded: Expanded }
  | { fragment: Fragment; error: FragmentFailure };

/**
 * A build: units added in dependency order, sharing one export registry.
 */
export class ShaderBuild {
  readonly registry = new ExportRegistry();
  readonly checker: Checker | undefined;
  readonly directives: boolean;

  constructor(options: ShaderBuildOptions = {}) {
    this.checker = options.checker;
    this.directives = options.directives ?? true;
  }

  /** declare a unit, after the units it depends on */
  unit(name: string, dependencies: readonly string[] = []): BuildUnit {
    this.registry.addUnit(name, dependencies);
    return new BuildUnit(this, name);
  }
}

/** the fragments of one build unit, e.g. one host source file */
export class BuildUnit {
  private fragments: Fragment[] = [];
  private results: FragmentResult[] | undefined;

  constructor(
    readonly build: ShaderBuild,
    readonly name: string
  ) {}

  fragment(fragment: Fragment): this {
    if (this.results) {
      throw new Error(`unit '${this.name}' is already expanded`);
    }
    this.fragments.push(fragment);
    return this;
  }

  /**
   * Register the unit's exports, then expand each fragment in declaration order.
   * A fragment that fails doesn't stop the others.
   */
  expand(): FragmentResult[] {
    if (!this.results) {
      const failed = this.registerExports();
      this.results = this.fragments.map((fragment) => {
        const error = failed.get(fragment);
        return error ? { fragment, error } : this.expandOne(fragment);
      });
    }
    return this.results;
  }

  private registerExports(): Map<Fragment, StitchError> {
    const { registry } = this.build;
    const failed = new Map<Fragment, StitchError>();
    for (const f of this.fragments) {
      if (f.name === undefined) continue;
      try {
        registry.register(this.name, f.name, f);
      } catch (e) {
        if (!(e instanceof StitchError)) throw e;
        failed.set(f, e);
      }
    }
    return failed;
  }

  private expandOne(fragment: Fragment): FragmentResult {
    const { registry, checker, directives } = this.build;
    try {
      const options = { registry, unit: this.name, checker, directives };
      const expanded = expandFragment(fragment, options);
      return { fragment, expanded };
    } catch (e) {
      if (e instanceof StitchError || e instanceof CheckFailedError) {
        return { fragment, error: e };
      }
      throw e;
    }
  }
}
