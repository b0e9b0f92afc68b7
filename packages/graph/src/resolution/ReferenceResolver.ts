/**
 * Phase 2: walk one unit's tree and turn every usage into reference edges.
 *
 * Reads only the SymbolTable built at the barrier. Everything it learns goes
 * into the unit's own UnitResolution buffer; merging buffers into the graph
 * is the run's job.
 */

import type { Logger } from "@deadwood/core";
import { silentLogger } from "@deadwood/core";
import type { SyntaxNode } from "@deadwood/syntax";
import { staticStringValue } from "@deadwood/syntax";
import type { LocalImport, SymbolTable } from "../extraction/SymbolTable.js";
import { nodeKey, type ExtractedUnit } from "../extraction/SymbolTableBuilder.js";
import type {
  EdgeEvidence,
  EdgeKind,
  ReferenceEdge,
  SymbolEvidence,
  SymbolId,
  SymbolRecord,
} from "../model.js";
import type { ExportResolver } from "./ExportResolver.js";
import type { ModuleResolver } from "./ModuleResolver.js";

export interface UnitResolution {
  unitPath: string;
  edges: ReferenceEdge[];
  evidence: Array<{ symbolId: SymbolId; flag: SymbolEvidence }>;
  /** Literal keys used in `x["key"]` anywhere in the unit */
  stringKeys: Set<string>;
  /** Imported names this unit could not resolve */
  unresolvedNames: Set<string>;
  unresolvedReferences: number;
}

type Binding =
  | { kind: "symbols"; ids: readonly SymbolId[] }
  | { kind: "import"; local: LocalImport }
  | { kind: "none" };

interface Usage {
  node: SyntaxNode;
  owner: SymbolId;
  kind: EdgeKind;
  evidence: EdgeEvidence[];
}

const DECLARING_PARENTS = new Set([
  "function_declaration",
  "generator_function_declaration",
  "function_expression",
  "function",
  "generator_function",
  "class_declaration",
  "abstract_class_declaration",
  "class",
  "interface_declaration",
  "type_alias_declaration",
  "enum_declaration",
  "internal_module",
  "module",
  "type_parameter",
]);

const REFLECTIVE_CALLEES = new Set(["eval", "Function"]);
const ENUMERATING_METHODS = new Set(["keys", "values", "entries", "getOwnPropertyNames"]);
const MODULE_OBJECTS = new Set(["module", "exports", "globalThis"]);

export class ReferenceResolver {
  constructor(
    private readonly table: SymbolTable,
    private readonly modules: ModuleResolver,
    private readonly exports: ExportResolver,
    private readonly logger: Logger = silentLogger
  ) {}

  resolveUnit(unit: ExtractedUnit): UnitResolution {
    const run = new UnitWalk(unit, this.table, this.modules, this.exports);
    run.moduleLoads();
    run.walk();
    const out = run.out;
    if (out.unresolvedReferences > 0) {
      this.logger.debug(`${unit.unitPath}: ${out.unresolvedReferences} unresolved reference(s)`);
    }
    return out;
  }
}

class UnitWalk {
  readonly out: UnitResolution;
  private readonly fallbackSeen = new Set<string>();

  constructor(
    private readonly unit: ExtractedUnit,
    private readonly table: SymbolTable,
    private readonly modules: ModuleResolver,
    private readonly exports: ExportResolver
  ) {
    this.out = {
      unitPath: unit.unitPath,
      edges: [],
      evidence: [],
      stringKeys: new Set(),
      unresolvedNames: new Set(),
      unresolvedReferences: 0,
    };
  }

  /** Static imports and re-exports load their target module. */
  moduleLoads(): void {
    for (const record of this.unit.imports) {
      const target = this.modules.resolve(record.specifier, this.unit.unitPath);
      if (target.kind === "external") continue;
      if (target.kind === "unresolved") {
        this.out.unresolvedReferences++;
        for (const binding of record.bindings) {
          if (binding.imported !== "*") this.out.unresolvedNames.add(binding.imported);
        }
        continue;
      }
      if (record.typeOnly) continue;
      const targetUnit = this.table.unit(target.path);
      if (!targetUnit) continue;
      this.out.edges.push({
        from: this.unit.moduleSymbol.id,
        to: targetUnit.moduleSymbol.id,
        kind: "module-load",
        evidence: [],
        unitPath: this.unit.unitPath,
        line: record.line,
        column: 1,
      });
    }
  }

  walk(): void {
    const stack: Array<{ node: SyntaxNode; owner: SymbolId }> = [
      { node: this.unit.root, owner: this.unit.moduleSymbol.id },
    ];
    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const owner = this.unit.attribution.get(nodeKey(frame.node)) ?? frame.owner;
      const children = this.visit(frame.node, owner) ?? frame.node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push({ node: child, owner });
      }
    }
  }

  /**
   * Handle one node. Returns the children to descend into, or undefined for
   * all of them.
   */
  private visit(node: SyntaxNode, owner: SymbolId): SyntaxNode[] | undefined {
    switch (node.type) {
      case "import_statement":
      case "export_clause":
      case "namespace_export":
      case "jsx_closing_element":
        return [];

      case "export_statement":
        return exportChildren(node);

      case "identifier":
        if (!isDeclarationName(node)) {
          this.reference({ node, owner, kind: identifierKind(node), evidence: [] }, node.text);
        }
        return [];

      case "type_identifier":
        if (!isDeclarationName(node)) {
          this.reference({ node, owner, kind: typeKind(node), evidence: [] }, node.text);
        }
        return [];

      case "shorthand_property_identifier":
        this.reference({ node, owner, kind: "reference", evidence: [] }, node.text);
        return [];

      case "internal_module":
      case "module":
        return present(node.childForFieldName("body"));

      case "import_alias":
        // import A = B.C
        return node.namedChildren.slice(1);

      case "variable_declarator": {
        const pattern = node.childForFieldName("name");
        const value = node.childForFieldName("value");
        if (pattern?.type !== "object_pattern") return present(node.childForFieldName("type"), value);
        this.destructure(pattern, value, owner);
        return [...present(node.childForFieldName("type"), value), ...patternDefaults(pattern)];
      }

      case "required_parameter":
      case "optional_parameter":
        return node.children.filter((child) => !sameNode(child, node.childForFieldName("pattern")));

      case "formal_parameters":
        // plain JavaScript parameters are bare identifiers and patterns
        return node.namedChildren.flatMap((child) => {
          if (child.type === "assignment_pattern") return present(child.childForFieldName("right"));
          if (child.type === "identifier" || child.type.endsWith("_pattern")) return [];
          return [child];
        });

      case "arrow_function":
        return node.children.filter((child) => !sameNode(child, node.childForFieldName("parameter")));

      case "catch_clause":
        return node.children.filter((child) => !sameNode(child, node.childForFieldName("parameter")));

      case "for_in_statement":
        return node.children.filter((child) => !sameNode(child, node.childForFieldName("left")));

      case "member_expression":
        return this.memberExpression(node, owner);

      case "nested_identifier":
      case "nested_type_identifier":
        return this.nestedIdentifier(node, owner);

      case "subscript_expression":
        return this.subscriptExpression(node, owner);

      case "call_expression":
        this.callExpression(node, owner);
        return undefined;

      case "new_expression": {
        const constructor = node.childForFieldName("constructor");
        if (constructor?.type === "identifier" && this.isGlobal(constructor.text, owner)) {
          if (constructor.text === "Function") this.flag(owner, "reflective-access");
        }
        return undefined;
      }

      default:
        return undefined;
    }
  }

  // ---------------------------------------------------------------------------
  // Names
  // ---------------------------------------------------------------------------

  private reference(usage: Usage, name: string): void {
    const binding = this.lookup(name, usage.owner);
    if (binding.kind === "symbols") {
      for (const id of binding.ids) this.emit(usage, id);
    } else if (binding.kind === "import") {
      this.referenceImport(usage, binding.local);
    }
  }

  private referenceImport(usage: Usage, local: LocalImport): void {
    const { record, binding } = local;
    const target = this.modules.resolve(record.specifier, this.unit.unitPath);
    if (target.kind !== "unit") return; // counted once at the import

    const evidence: EdgeEvidence[] = binding.typeOnly
      ? [...usage.evidence, "type-only"]
      : usage.evidence;

    if (binding.imported === "*") {
      this.namespaceEscape({ ...usage, evidence }, target.path);
      return;
    }

    const resolved = this.exports.resolve(target.path, binding.imported);
    switch (resolved.kind) {
      case "symbols": {
        const withChain: EdgeEvidence[] = resolved.viaReexport ? [...evidence, "via-reexport"] : evidence;
        for (const id of resolved.ids) this.emit({ ...usage, evidence: withChain }, id);
        return;
      }
      case "namespace":
        this.namespaceEscape({ ...usage, evidence: [...evidence, "via-reexport"] }, resolved.unitPath);
        return;
      case "external":
        return;
      case "unresolved":
        this.unresolved(binding.imported);
    }
  }

  /** A namespace object used as a value can reach any export of its unit. */
  private namespaceEscape(usage: Usage, unitPath: string): void {
    const evidence: EdgeEvidence[] = [...usage.evidence, "namespace-escape"];
    for (const id of this.exports.resolveAll(unitPath)) {
      this.emit({ ...usage, kind: "reference", evidence }, id);
    }
  }

  private lookup(name: string, ownerId: SymbolId): Binding {
    let current: SymbolRecord | undefined = this.table.symbol(ownerId);
    let skipScope = false;
    while (current && current.kind !== "module") {
      const ids = skipScope ? undefined : this.unit.scopes.get(current.id)?.get(name);
      if (ids) return { kind: "symbols", ids };
      const parent: SymbolRecord | undefined = current.ownerId ? this.table.symbol(current.ownerId) : undefined;
      // a class scope holds constructor and static block locals; members never see them
      skipScope = parent?.kind === "class" && (current.kind === "method" || current.kind === "property");
      current = parent;
    }
    const ids = this.unit.topLevel.get(name);
    if (ids) return { kind: "symbols", ids };
    const local = this.table.importedBinding(this.unit.unitPath, name);
    if (local) return { kind: "import", local };
    return { kind: "none" };
  }

  private isGlobal(name: string, owner: SymbolId): boolean {
    return this.lookup(name, owner).kind === "none";
  }

  // ---------------------------------------------------------------------------
  // Members
  // ---------------------------------------------------------------------------

  private memberExpression(node: SyntaxNode, owner: SymbolId): SyntaxNode[] {
    const object = node.childForFieldName("object");
    const property = node.childForFieldName("property");
    if (!object) return [];
    if (!property) return [object];

    const usage: Usage = { node: property, owner, kind: memberKind(node), evidence: [] };
    return this.member(object, property.text, usage) ? [object] : [];
  }

  private nestedIdentifier(node: SyntaxNode, owner: SymbolId): SyntaxNode[] {
    const object = node.childForFieldName("module") ?? node.namedChildren[0];
    const property = node.childForFieldName("name") ?? node.namedChildren[node.namedChildCount - 1];
    if (!object || !property || sameNode(object, property)) return [];

    const kind: EdgeKind = node.type === "nested_type_identifier" ? typeKind(node) : memberKind(node);
    return this.member(object, property.text, { node: property, owner, kind, evidence: [] })
      ? [object]
      : [];
  }

  private subscriptExpression(node: SyntaxNode, owner: SymbolId): SyntaxNode[] | undefined {
    const object = node.childForFieldName("object");
    const index = node.childForFieldName("index");
    if (!object || !index) return undefined;

    const key = staticStringValue(index);
    if (key === undefined) {
      if (this.isDynamicReceiver(object, owner)) this.flag(owner, "dynamic-access");
      return undefined;
    }

    this.out.stringKeys.add(key);
    const usage: Usage = { node: index, owner, kind: memberKind(node), evidence: ["string-key"] };
    return this.member(object, key, usage) ? [object] : [];
  }

  /**
   * Resolve `object.name`. Returns whether the object expression should
   * still be walked for its own references.
   */
  private member(object: SyntaxNode, name: string, usage: Usage): boolean {
    if (object.type === "this") {
      const owningClass = this.enclosingClass(usage.owner);
      const ids = owningClass ? this.membersOf(owningClass, name) : [];
      if (ids.length > 0) ids.forEach((id) => this.emit(usage, id));
      else this.byName(usage, name);
      return false;
    }

    if (object.type === "identifier") {
      const binding = this.lookup(object.text, usage.owner);

      if (binding.kind === "import") {
        const handled = this.importedMember(binding.local, name, usage);
        if (handled === "namespace") return false;
        if (handled === "resolved") return true;
      } else if (binding.kind === "symbols") {
        const targets = binding.ids
          .map((id) => this.table.symbol(id))
          .filter((symbol): symbol is SymbolRecord => symbol !== undefined);
        if (targets.some((symbol) => symbol.kind === "class" || symbol.kind === "namespace")) {
          let found = false;
          for (const symbol of targets) {
            for (const id of this.membersOf(symbol, name)) {
              this.emit(usage, id);
              found = true;
            }
          }
          if (!found) this.byName(usage, name);
          return true;
        }
        if (targets.some((symbol) => symbol.kind === "enum")) return true;
      }
    }

    this.byName(usage, name);
    return true;
  }

  /** `const { a, b: c } = value` reads members `a` and `b` of the value. */
  private destructure(pattern: SyntaxNode, value: SyntaxNode | null, owner: SymbolId): void {
    const receiver = value?.type === "new_expression" ? value.childForFieldName("constructor") : value;
    for (const key of patternKeys(pattern)) {
      const usage: Usage = { node: key.node, owner, kind: "member-access", evidence: [] };
      if (receiver) this.member(receiver, key.name, usage);
      else this.byName(usage, key.name);
    }
  }

  private importedMember(
    local: LocalImport,
    name: string,
    usage: Usage
  ): "namespace" | "resolved" | "unhandled" {
    const { record, binding } = local;
    const target = this.modules.resolve(record.specifier, this.unit.unitPath);
    if (target.kind !== "unit") return binding.imported === "*" ? "namespace" : "resolved";

    let namespaceUnit: string | undefined;
    let viaReexport = false;
    if (binding.imported === "*") {
      namespaceUnit = target.path;
    } else {
      const resolved = this.exports.resolve(target.path, binding.imported);
      if (resolved.kind === "namespace") {
        namespaceUnit = resolved.unitPath;
        viaReexport = true;
      } else if (resolved.kind === "symbols") {
        let found = false;
        for (const id of resolved.ids) {
          const symbol = this.table.symbol(id);
          if (!symbol || (symbol.kind !== "class" && symbol.kind !== "namespace")) continue;
          for (const memberId of this.membersOf(symbol, name)) {
            this.emit(usage, memberId);
            found = true;
          }
        }
        return found ? "resolved" : "unhandled";
      } else {
        return "resolved";
      }
    }

    const member = this.exports.resolve(namespaceUnit, name);
    const evidence: EdgeEvidence[] = [
      ...usage.evidence,
      ...(binding.typeOnly ? (["type-only"] as const) : []),
      ...(viaReexport || (member.kind === "symbols" && member.viaReexport)
        ? (["via-reexport"] as const)
        : []),
    ];
    if (member.kind === "symbols") {
      for (const id of member.ids) this.emit({ ...usage, kind: "namespace-member", evidence }, id);
    } else if (member.kind === "namespace") {
      this.namespaceEscape({ ...usage, evidence }, member.unitPath);
    } else if (member.kind === "unresolved") {
      this.unresolved(name);
    }
    return "namespace";
  }

  /** Receiver unknown: every class member with this name may be the target. */
  private byName(usage: Usage, name: string): void {
    for (const id of this.table.classMembersNamed(name)) {
      const key = `${usage.owner}\0${id}`;
      if (this.fallbackSeen.has(key)) continue;
      this.fallbackSeen.add(key);
      this.emit({ ...usage, kind: "member-access", evidence: [...usage.evidence, "receiver-unknown"] }, id);
    }
  }

  private membersOf(symbol: SymbolRecord, name: string): readonly SymbolId[] {
    return this.table.unit(symbol.unitPath)?.members.get(symbol.id)?.get(name) ?? [];
  }

  private enclosingClass(ownerId: SymbolId): SymbolRecord | undefined {
    let current = this.table.symbol(ownerId);
    while (current) {
      if (current.kind === "class") return current;
      current = current.ownerId ? this.table.symbol(current.ownerId) : undefined;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Dynamic and reflective access
  // ---------------------------------------------------------------------------

  private callExpression(node: SyntaxNode, owner: SymbolId): void {
    const callee = node.childForFieldName("function");
    const args = node.childForFieldName("arguments");
    if (!callee) return;

    if (callee.type === "import") {
      this.dynamicImport(args?.namedChildren[0], node, owner);
      return;
    }

    if (callee.type === "identifier" && this.isGlobal(callee.text, owner)) {
      if (callee.text === "require") this.dynamicImport(args?.namedChildren[0], node, owner);
      else if (REFLECTIVE_CALLEES.has(callee.text)) this.flag(owner, "reflective-access");
      return;
    }

    if (callee.type === "member_expression") {
      const object = callee.childForFieldName("object");
      const method = callee.childForFieldName("property")?.text;
      if (object?.type !== "identifier" || !this.isGlobal(object.text, owner)) return;
      if (object.text === "Reflect") {
        this.flag(owner, "reflective-access");
      } else if (object.text === "Object" && method && ENUMERATING_METHODS.has(method)) {
        const subject = args?.namedChildren[0];
        if (subject && this.isDynamicReceiver(subject, owner)) this.flag(owner, "dynamic-access");
      }
    }
  }

  private dynamicImport(argument: SyntaxNode | undefined, site: SyntaxNode, owner: SymbolId): void {
    const specifier = staticStringValue(argument);
    if (specifier === undefined) {
      this.flag(owner, "dynamic-import");
      return;
    }

    const target = this.modules.resolve(specifier, this.unit.unitPath);
    if (target.kind === "external") return;
    const targetUnit = target.kind === "unit" ? this.table.unit(target.path) : undefined;
    if (!targetUnit) {
      this.out.unresolvedReferences++;
      return;
    }

    const usage: Usage = { node: site, owner, kind: "module-load", evidence: ["dynamic-import"] };
    this.emit(usage, targetUnit.moduleSymbol.id);
    for (const id of this.exports.resolveAll(targetUnit.unitPath)) {
      this.emit({ ...usage, kind: "dynamic-import" }, id);
    }
  }

  /**
   * Receivers whose computed keys can address a declaration of this run:
   * `this`, classes, enums, namespaces and the module objects.
   */
  private isDynamicReceiver(object: SyntaxNode, owner: SymbolId): boolean {
    if (object.type === "this") return true;
    if (object.type !== "identifier") return false;
    if (MODULE_OBJECTS.has(object.text) && this.isGlobal(object.text, owner)) return true;

    const binding = this.lookup(object.text, owner);
    if (binding.kind === "import") return binding.local.binding.imported === "*";
    if (binding.kind === "symbols") {
      return binding.ids.some((id) => {
        const kind = this.table.symbol(id)?.kind;
        return kind === "class" || kind === "enum" || kind === "namespace";
      });
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  private emit(usage: Usage, to: SymbolId): void {
    this.out.edges.push({
      from: usage.owner,
      to,
      kind: usage.kind,
      evidence: usage.evidence,
      unitPath: this.unit.unitPath,
      line: usage.node.startPosition.row + 1,
      column: usage.node.startPosition.column + 1,
    });
  }

  private flag(symbolId: SymbolId, flag: SymbolEvidence): void {
    this.out.evidence.push({ symbolId, flag });
  }

  private unresolved(name: string): void {
    this.out.unresolvedReferences++;
    this.out.unresolvedNames.add(name);
  }
}

function exportChildren(node: SyntaxNode): SyntaxNode[] {
  if (node.childForFieldName("source")) return [];
  const decorators = node.namedChildren.filter((child) => child.type === "decorator");
  const declaration = node.childForFieldName("declaration");
  if (declaration) return [...decorators, declaration];

  const value =
    node.childForFieldName("value") ??
    (node.children.some((c) => c.type === "=")
      ? node.namedChildren.find((c) => c.type !== "decorator")
      : undefined);
  // `export default name` names a binding; it does not use it
  if (!value || value.type === "identifier") return decorators;
  return [...decorators, value];
}

function patternKeys(pattern: SyntaxNode): Array<{ name: string; node: SyntaxNode }> {
  const keys: Array<{ name: string; node: SyntaxNode }> = [];
  for (const child of pattern.namedChildren) {
    const node =
      child.type === "pair_pattern"
        ? child.childForFieldName("key")
        : child.type === "object_assignment_pattern"
          ? child.childForFieldName("left")
          : child;
    if (!node) continue;
    let name: string | undefined;
    if (node.type === "string") name = staticStringValue(node);
    else if (node.type === "property_identifier" || node.type === "shorthand_property_identifier_pattern") {
      name = node.text;
    }
    if (name !== undefined) keys.push({ name, node });
  }
  return keys;
}

/** Default values inside a pattern are expressions evaluated at the declaration. */
function patternDefaults(pattern: SyntaxNode): SyntaxNode[] {
  const defaults: SyntaxNode[] = [];
  for (const child of pattern.namedChildren) {
    const target = child.type === "pair_pattern" ? child.childForFieldName("value") : child;
    if (target?.type === "object_assignment_pattern" || target?.type === "assignment_pattern") {
      const right = target.childForFieldName("right");
      if (right) defaults.push(right);
    }
  }
  return defaults;
}

function isDeclarationName(node: SyntaxNode): boolean {
  const parent = node.parent;
  if (!parent) return false;
  if (DECLARING_PARENTS.has(parent.type)) {
    return sameNode(parent.childForFieldName("name"), node);
  }
  return false;
}

function identifierKind(node: SyntaxNode): EdgeKind {
  const parent = node.parent;
  if (!parent) return "reference";
  switch (parent.type) {
    case "call_expression":
      return sameNode(parent.childForFieldName("function"), node) ? "call" : "reference";
    case "new_expression":
      return sameNode(parent.childForFieldName("constructor"), node) ? "instantiation" : "reference";
    case "extends_clause":
    case "class_heritage":
      return "heritage";
    case "jsx_opening_element":
    case "jsx_self_closing_element":
      return sameNode(parent.childForFieldName("name"), node) ? "jsx-element" : "reference";
    default:
      return "reference";
  }
}

function typeKind(node: SyntaxNode): EdgeKind {
  let current = node.parent;
  for (let depth = 0; current && depth < 3; depth++) {
    if (
      current.type === "extends_clause" ||
      current.type === "implements_clause" ||
      current.type === "extends_type_clause"
    ) {
      return "heritage";
    }
    current = current.parent;
  }
  return "type-reference";
}

function memberKind(node: SyntaxNode): EdgeKind {
  const kind = identifierKind(node);
  return kind === "reference" ? "member-access" : kind;
}

function sameNode(a: SyntaxNode | null | undefined, b: SyntaxNode | null | undefined): boolean {
  if (!a || !b) return false;
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

function present(...nodes: Array<SyntaxNode | null>): SyntaxNode[] {
  return nodes.filter((node): node is SyntaxNode => node !== null);
}
