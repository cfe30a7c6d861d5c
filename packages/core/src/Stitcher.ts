import { ExportRegistry } from "./ExportRegistry.js";
import { Fragment, Token } from "./Fragment.js";
import { DirectiveOptions } from "./ModeSelector.js";
import { SrcPosition, definitionPosition, inheritOrigin } from "./Origin.js";
import { ImportReference, scanReferences } from "./ReferenceScanner.js";
import { ImportCycleError, UnresolvedExportError } from "./StitchErrors.js";

export interface StitchContext extends DirectiveOptions {
  registry: ExportRegistry;
  /** build unit of the root fragment, controls which exports are visible */
  unit: string;
}

/** a fragment with its import markers resolved */
export interface StitchedFragment {
  name?: string;
  tokens: Token[];
  origin: SrcPosition;
}

export interface StitchedModule {
  /** imported definitions, each once, in first reference depth first order */
  imports: StitchedFragment[];
  root: StitchedFragment;
}

/**
 * Resolve the import markers of a root fragment, transitively.
 *
 * Each imported definition is placed before the first fragment that refers to it.
 * Tokens copied from an import keep their definition site as origin.
 *
 * @throws UnresolvedExportError, ImportCycleError
 */
export function stitch(root: Fragment, context: StitchContext): StitchedModule {
  const { registry, unit, directives } = context;
  const resolved = new Set<string>();
  const inProgress: string[] = root.name ? [root.name] : [];
  const imports: StitchedFragment[] = [];

  /** resolve the references in tokens, @return the residual tokens */
  function expand(tokens: readonly Token[]): Token[] {
    const { references, residual } = scanReferences(tokens, { directives });
    references.forEach(resolveReference);
    return residual;
  }

  function resolveReference(ref: ImportReference): void {
    const { name, callSite } = ref;
    const cycleStart = inProgress.indexOf(name);
    if (cycleStart !== -1) {
      throw new ImportCycleError([...inProgress.slice(cycleStart), name], callSite);
    }
    if (resolved.has(name)) return;

    const found = registry.lookup(unit, name);
    if (!found) {
      throw new UnresolvedExportError(name, callSite, registry.exportOwner(name));
    }

    inProgress.push(name);
    const importSite = definitionPosition(callSite);
    const inherited = found.tokens.map((t) => ({
      text: t.text,
      origin: inheritOrigin(t.origin, importSite),
    }));
    const tokens = expand(inherited);
    inProgress.pop();

    resolved.add(name);
    imports.push({ name, tokens, origin: found.origin });
  }

  const rootTokens = expand(root.tokens);
  const stitchedRoot = { name: root.name, tokens: rootTokens, origin: root.origin };
  return { imports, root: stitchedRoot };
}
