import { HostSource } from "@wgsl-stitch/core";
import ts from "typescript";

/** a wgsl fragment found in a host file */
export interface HostFragment {
  /** export name, for wgslExport("name", wgsl`...`) */
  name?: string;

  /** the wgsl text between the template's backticks */
  textStart: number;
  textEnd: number;

  /** the expression replaced by the expanded text: the tagged template or the wgslExport() call */
  replaceStart: number;
  replaceEnd: number;
}

/** a host construct that looks like a fragment but can't be used */
export interface HostProblem {
  offset: number;
  message: string;
}

export interface HostScan {
  fragments: HostFragment[];
  /** relative module specifiers imported or re-exported by the file */
  imports: string[];
  problems: HostProblem[];
}

const tagName = "wgsl";
const exportName = "wgslExport";

/**
 * Find wgsl`...` tagged templates, wgslExport("name", wgsl`...`) calls
 * and relative imports in a typescript or javascript host file.
 */
export function scanHostFile(src: HostSource): HostScan {
  const sourceFile = ts.createSourceFile(
    src.path,
    src.text,
    ts.ScriptTarget.Latest,
    true,
    scriptKind(src.path)
  );
  const fragments: HostFragment[] = [];
  const imports: string[] = [];
  const problems: HostProblem[] = [];

  function visit(node: ts.Node): void {
    if (ts.isImportDeclaration(node) || ts.isExportDeclaration(node)) {
      const specifier = node.moduleSpecifier;
      if (specifier && ts.isStringLiteral(specifier) && specifier.text.startsWith(".")) {
        imports.push(specifier.text);
      }
    } else if (isCallTo(node, exportName)) {
      exportCall(node);
      return;
    } else if (isTaggedWgsl(node)) {
      const found = templateFragment(node, node);
      found && fragments.push(found);
      return;
    }
    ts.forEachChild(node, visit);
  }

  function exportCall(call: ts.CallExpression): void {
    const [nameArg, templateArg] = call.arguments;
    if (
      call.arguments.length !== 2 ||
      !ts.isStringLiteralLike(nameArg) ||
      !isTaggedWgsl(templateArg)
    ) {
      const message = `${exportName}() expects a name string and a ${tagName}\`\` template`;
      problems.push({ offset: call.getStart(sourceFile), message });
      return;
    }
    const found = templateFragment(templateArg, call);
    found && fragments.push({ ...found, name: nameArg.text });
  }

  function templateFragment(
    tagged: ts.TaggedTemplateExpression,
    replaced: ts.Node
  ): HostFragment | undefined {
    const { template } = tagged;
    if (!ts.isNoSubstitutionTemplateLiteral(template)) {
      const message = `${tagName} templates can't contain \${} substitutions`;
      problems.push({ offset: template.getStart(sourceFile), message });
      return undefined;
    }
    return {
      textStart: template.getStart(sourceFile) + 1,
      textEnd: template.getEnd() - 1,
      replaceStart: replaced.getStart(sourceFile),
      replaceEnd: replaced.getEnd(),
    };
  }

  ts.forEachChild(sourceFile, visit);
  return { fragments, imports, problems };
}

function isCallTo(node: ts.Node, name: string): node is ts.CallExpression {
  return (
    ts.isCallExpression(node) &&
    ts.isIdentifier(node.expression) &&
    node.expression.text === name
  );
}

function isTaggedWgsl(
  node: ts.Node | undefined
): node is ts.TaggedTemplateExpression {
  return (
    !!node &&
    ts.isTaggedTemplateExpression(node) &&
    ts.isIdentifier(node.tag) &&
    node.tag.text === tagName
  );
}

function scriptKind(path: string): ts.ScriptKind {
  if (path.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (path.endsWith(".jsx")) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/.test(path)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}
