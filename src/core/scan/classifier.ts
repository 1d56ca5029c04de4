/**
 * Scope classifier: labels every function definition in a file with exactly
 * one role, from static structure only.
 *
 * Rules, first match wins:
 *   1. file under a tool-implementation path -> tool-implementation
 *   2. name starts with "_"                  -> private-helper
 *   3. name is a lifecycle hook              -> lifecycle-hook
 *   4. method of a test-suite class whose name has a test prefix -> test-method
 *   5. anything else                         -> other
 *
 * A nested function's immediate container is its enclosing function, so it is
 * classified as a free function and can never be a test method.
 */
import type Parser from 'tree-sitter';
import type { ClassificationConfig } from '../config/schema.js';
import { createPathMatcher, type PathMatcher } from '../../utils/path-matcher.js';
import {
  PYTHON_SCOPE_TYPES,
  PyDefinitionNodes,
  getBaseClassNames,
  getDecoratorNames,
  getDefinitionName,
  isAsyncFunction,
} from '../../validators/tree-sitter/python-ast.js';
import { getLocation, walkTree } from '../../validators/tree-sitter/TreeSitterUtils.js';
import type { FunctionScope, ParsedSourceUnit, ScopeRole } from './types.js';

/**
 * Prepared classification inputs.
 */
export interface ClassifierOptions {
  toolPaths: PathMatcher;
  testPaths: PathMatcher;
  testBaseClasses: ReadonlySet<string>;
  testMethodPrefixes: readonly string[];
  lifecycleHooks: ReadonlySet<string>;
}

interface LexicalContext {
  className?: string;
  classIsSuite: boolean;
  prefix: string;
  depth: number;
}

export function createClassifierOptions(config: ClassificationConfig): ClassifierOptions {
  return {
    toolPaths: createPathMatcher(config.tool_paths),
    testPaths: createPathMatcher(config.test_paths),
    testBaseClasses: new Set(config.test_base_classes),
    testMethodPrefixes: [...config.test_method_prefixes],
    lifecycleHooks: new Set(config.lifecycle_hooks),
  };
}

/**
 * Classify every function definition in a parsed file.
 * Returns top-level scopes (module functions and class methods) with nested
 * scopes under `children`, in source order.
 */
export function classifyScopes(
  unit: ParsedSourceUnit,
  options: ClassifierOptions
): FunctionScope[] {
  return new ScopeClassifier(unit, options).classify();
}

/**
 * Depth-first, source-ordered list of a scope forest.
 */
export function flattenScopes<S extends { children: readonly S[] }>(scopes: readonly S[]): S[] {
  const flat: S[] = [];
  const visit = (scope: S): void => {
    flat.push(scope);
    scope.children.forEach(visit);
  };
  scopes.forEach(visit);
  return flat;
}

class ScopeClassifier {
  private readonly isToolFile: boolean;
  private readonly isTestPath: boolean;
  /** Local class name -> base lists of every definition with that name */
  private readonly localBases = new Map<string, string[][]>();
  private readonly suiteCache = new Map<string, boolean>();

  constructor(
    private readonly unit: ParsedSourceUnit,
    private readonly options: ClassifierOptions
  ) {
    this.isToolFile = options.toolPaths.matches(unit.path);
    this.isTestPath = options.testPaths.matches(unit.path);
  }

  classify(): FunctionScope[] {
    const root = this.unit.tree.rootNode;
    this.indexClasses(root);
    return this.collect(root, { classIsSuite: false, prefix: '', depth: 0 });
  }

  private indexClasses(root: Parser.SyntaxNode): void {
    walkTree(root, (node) => {
      if (node.type !== PyDefinitionNodes.CLASS_DEFINITION) return;
      const name = getDefinitionName(node, this.unit.text);
      if (!name) return;
      const entries = this.localBases.get(name) ?? [];
      entries.push(getBaseClassNames(node, this.unit.text));
      this.localBases.set(name, entries);
    });
  }

  private collect(container: Parser.SyntaxNode, ctx: LexicalContext): FunctionScope[] {
    const scopes: FunctionScope[] = [];

    for (const def of findDefinitions(container)) {
      const name = getDefinitionName(def, this.unit.text);
      if (!name) continue;
      const body = def.childForFieldName('body');

      if (def.type === PyDefinitionNodes.CLASS_DEFINITION) {
        if (!body) continue;
        scopes.push(
          ...this.collect(body, {
            className: name,
            classIsSuite: this.isTestSuiteClass(getBaseClassNames(def, this.unit.text)),
            prefix: `${ctx.prefix}${name}.`,
            depth: ctx.depth,
          })
        );
        continue;
      }

      const qualifiedName = `${ctx.prefix}${name}`;
      const { role, reason } = this.decideRole(name, ctx);
      const { line, column } = getLocation(def);
      const children = body
        ? this.collect(body, { classIsSuite: false, prefix: `${qualifiedName}.`, depth: ctx.depth + 1 })
        : [];

      scopes.push({
        name,
        qualifiedName,
        className: ctx.className,
        line,
        column,
        depth: ctx.depth,
        decorators: getDecoratorNames(def, this.unit.text),
        isAsync: isAsyncFunction(def),
        role,
        reason,
        node: def,
        children,
      });
    }

    return scopes;
  }

  private decideRole(name: string, ctx: LexicalContext): { role: ScopeRole; reason: string } {
    if (this.isToolFile) {
      return { role: 'tool-implementation', reason: 'file is under a tool implementation path' };
    }
    if (name.startsWith('_')) {
      return { role: 'private-helper', reason: 'name starts with an underscore' };
    }
    if (this.options.lifecycleHooks.has(name)) {
      return { role: 'lifecycle-hook', reason: 'name is a lifecycle hook' };
    }
    if (!ctx.className) {
      return { role: 'other', reason: ctx.depth > 0 ? 'nested function' : 'module-level function' };
    }
    if (!ctx.classIsSuite) {
      return { role: 'other', reason: `class ${ctx.className} is not a test suite` };
    }
    if (!this.options.testMethodPrefixes.some((prefix) => name.startsWith(prefix))) {
      return { role: 'other', reason: 'name has no test method prefix' };
    }
    return { role: 'test-method', reason: `test method of ${ctx.className}` };
  }

  private isTestSuiteClass(bases: readonly string[]): boolean {
    return this.isTestPath || this.basesReachSuite(bases, new Set());
  }

  /**
   * Name-only, transitive lookup over classes defined in this file.
   * Bases defined elsewhere are recognised by name alone.
   */
  private basesReachSuite(bases: readonly string[], visiting: Set<string>): boolean {
    for (const base of bases) {
      const lastSegment = base.slice(base.lastIndexOf('.') + 1);
      if (this.options.testBaseClasses.has(base) || this.options.testBaseClasses.has(lastSegment)) {
        return true;
      }
      if (base.includes('.')) continue;
      if (this.localClassIsSuite(base, visiting)) return true;
    }
    return false;
  }

  private localClassIsSuite(name: string, visiting: Set<string>): boolean {
    const cached = this.suiteCache.get(name);
    if (cached !== undefined) return cached;

    const definitions = this.localBases.get(name);
    if (!definitions || visiting.has(name)) return false;

    const isRoot = visiting.size === 0;
    visiting.add(name);
    const result = definitions.some((bases) => this.basesReachSuite(bases, visiting));
    visiting.delete(name);
    // A negative answer reached through a cut cycle is only partial
    if (result || isRoot) this.suiteCache.set(name, result);
    return result;
  }
}

/**
 * Class and function definitions directly under a node, looking through
 * compound statements (if/try/with/for) but not into other definitions.
 */
function findDefinitions(container: Parser.SyntaxNode): Parser.SyntaxNode[] {
  const defs: Parser.SyntaxNode[] = [];
  for (const child of container.children) {
    walkTree(child, (node) => {
      if (PYTHON_SCOPE_TYPES.includes(node.type)) {
        defs.push(node);
        return false;
      }
      // Lambdas cannot contain def statements
      return node.type !== PyDefinitionNodes.LAMBDA;
    });
  }
  return defs;
}
