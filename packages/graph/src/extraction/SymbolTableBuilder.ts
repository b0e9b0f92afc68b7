/**
 * Phase 1: one parsed unit -> its declarations, imports and exports.
 *
 * Extraction never looks at another unit. Cross-unit questions wait for the
 * SymbolTable, which is built from every ExtractedUnit at the barrier.
 */

import type { ParsedSource, SyntaxNode } from "@deadwood/syntax";
import { fieldText, nodeToSpan, staticStringValue, walk } from "@deadwood/syntax";
import type {
  Diagnostic,
  ExportBinding,
  ImportBinding,
  ImportRecord,
  SymbolId,
  SymbolKind,
  SymbolRecord,
} from "../model.js";

export const MODULE_SYMBOL_NAME = "<module>";

export interface ExtractedUnit {
  unitPath: string;
  root: SyntaxNode;
  moduleSymbol: SymbolRecord;
  /** Declaration order, module symbol first */
  symbols: SymbolRecord[];
  /** Top-level bindings by name */
  topLevel: Map<string, SymbolId[]>;
  /** Names declared inside a function, method or namespace, per owner */
  scopes: Map<SymbolId, Map<string, SymbolId[]>>;
  /** Class and namespace members by property name, per owner */
  members: Map<SymbolId, Map<string, SymbolId[]>>;
  /** Node key -> symbol that owns usages inside that node */
  attribution: Map<string, SymbolId>;
  imports: ImportRecord[];
  exports: ExportBinding[];
  diagnostics: Diagnostic[];
}

export function nodeKey(node: SyntaxNode): string {
  return `${node.startIndex}-${node.endIndex}-${node.type}`;
}

const FUNCTION_VALUES = new Set([
  "arrow_function",
  "function_expression",
  "function",
  "generator_function",
]);

const DECLARATION_TYPES = new Set([
  "function_declaration",
  "generator_function_declaration",
  "class_declaration",
  "abstract_class_declaration",
  "interface_declaration",
  "type_alias_declaration",
  "enum_declaration",
  "lexical_declaration",
  "variable_declaration",
  "internal_module",
  "module",
]);

interface DeclareOptions {
  owner?: SymbolRecord;
  exported: boolean;
  defaultExport: boolean;
  decorators: string[];
}

const PLAIN: DeclareOptions = { exported: false, defaultExport: false, decorators: [] };

/**
 * Extract one unit. `diagnostics` are the unit's parse faults, already
 * converted; a unit with any of them marks every symbol parse-degraded.
 */
export function extractUnit(
  parsed: ParsedSource,
  unitPath: string,
  diagnostics: Diagnostic[] = []
): ExtractedUnit {
  const extraction = new UnitExtraction(unitPath, parsed.tree.rootNode, diagnostics);
  extraction.run();
  return extraction.result();
}

class UnitExtraction {
  private readonly symbols: SymbolRecord[] = [];
  private readonly qualifiedCounts = new Map<string, number>();
  private readonly topLevel = new Map<string, SymbolId[]>();
  private readonly scopes = new Map<SymbolId, Map<string, SymbolId[]>>();
  private readonly members = new Map<SymbolId, Map<string, SymbolId[]>>();
  private readonly attribution = new Map<string, SymbolId>();
  private readonly imports: ImportRecord[] = [];
  private exports: ExportBinding[] = [];
  private readonly moduleSymbol: SymbolRecord;
  private readonly degraded: boolean;

  constructor(
    private readonly unitPath: string,
    private readonly root: SyntaxNode,
    private readonly diagnostics: Diagnostic[]
  ) {
    this.degraded = diagnostics.length > 0;
    this.moduleSymbol = {
      id: `${unitPath}#${MODULE_SYMBOL_NAME}`,
      name: MODULE_SYMBOL_NAME,
      qualifiedName: MODULE_SYMBOL_NAME,
      kind: "module",
      unitPath,
      span: nodeToSpan(root),
      exported: false,
      defaultExport: false,
      decorators: [],
      evidence: new Set(this.degraded ? ["parse-degraded"] : []),
    };
    this.symbols.push(this.moduleSymbol);
  }

  run(): void {
    for (const statement of this.root.namedChildren) {
      this.topLevelStatement(statement);
    }
    this.bindLocalExports();
  }

  result(): ExtractedUnit {
    return {
      unitPath: this.unitPath,
      root: this.root,
      moduleSymbol: this.moduleSymbol,
      symbols: this.symbols,
      topLevel: this.topLevel,
      scopes: this.scopes,
      members: this.members,
      attribution: this.attribution,
      imports: this.imports,
      exports: this.exports,
      diagnostics: this.diagnostics,
    };
  }

  private topLevelStatement(node: SyntaxNode): void {
    switch (node.type) {
      case "import_statement":
        this.readImport(node);
        return;
      case "export_statement":
        this.readExport(node);
        return;
      case "expression_statement": {
        // `namespace X {}` at top level is wrapped in an expression statement
        const inner = node.namedChildren[0];
        if (inner && (inner.type === "internal_module" || inner.type === "module")) {
          this.declare(inner, PLAIN);
        }
        return;
      }
      default:
        if (DECLARATION_TYPES.has(node.type)) {
          this.declare(node, PLAIN);
        }
    }
  }

  // ---------------------------------------------------------------------------
  // Declarations
  // ---------------------------------------------------------------------------

  /** Returns the symbols the declaration binds directly, not its members. */
  private declare(node: SyntaxNode, options: DeclareOptions): SymbolRecord[] {
    switch (node.type) {
      case "function_declaration":
      case "generator_function_declaration": {
        const name = fieldText(node, "name");
        if (!name) return [];
        const symbol = this.createSymbol(name, "function", node, options);
        this.attribution.set(nodeKey(node), symbol.id);
        this.collectNested(node.childForFieldName("body"), symbol);
        return [symbol];
      }

      case "class_declaration":
      case "abstract_class_declaration": {
        const name = fieldText(node, "name");
        if (!name) return [];
        return [this.declareClass(node, name, node, options)];
      }

      case "interface_declaration":
      case "type_alias_declaration":
      case "enum_declaration": {
        const name = fieldText(node, "name");
        if (!name) return [];
        const kind: SymbolKind =
          node.type === "interface_declaration"
            ? "interface"
            : node.type === "enum_declaration"
              ? "enum"
              : "type";
        const symbol = this.createSymbol(name, kind, node, options);
        this.attribution.set(nodeKey(node), symbol.id);
        return [symbol];
      }

      case "internal_module":
      case "module":
        return this.declareNamespace(node, options);

      case "lexical_declaration":
      case "variable_declaration":
        return node.namedChildren
          .filter((child) => child.type === "variable_declarator")
          .flatMap((declarator) => this.declareVariable(declarator, options));

      default:
        return [];
    }
  }

  private declareClass(
    classNode: SyntaxNode,
    name: string,
    spanNode: SyntaxNode,
    options: DeclareOptions
  ): SymbolRecord {
    const decorators = [...options.decorators, ...this.decoratorsOf(classNode)];
    const classSymbol = this.createSymbol(name, "class", spanNode, { ...options, decorators });
    this.attribution.set(nodeKey(spanNode), classSymbol.id);
    this.attribution.set(nodeKey(classNode), classSymbol.id);

    const body = classNode.childForFieldName("body");
    if (!body) return classSymbol;

    let pending: string[] = [];
    for (const member of body.namedChildren) {
      if (member.type === "decorator") {
        pending.push(decoratorName(member));
        this.attribution.set(nodeKey(member), this.moduleSymbol.id);
        continue;
      }
      const memberDecorators = [...pending, ...this.decoratorsOf(member)];
      pending = [];

      switch (member.type) {
        case "method_definition":
        case "abstract_method_signature": {
          const memberName = propertyName(member.childForFieldName("name"));
          if (memberName === undefined || memberName === "constructor") {
            // constructor bodies run whenever the class is used
            this.collectNested(member.childForFieldName("body"), classSymbol);
            continue;
          }
          const method = this.createSymbol(memberName, "method", member, {
            ...PLAIN,
            owner: classSymbol,
            decorators: memberDecorators,
          });
          this.attribution.set(nodeKey(member), method.id);
          this.collectNested(member.childForFieldName("body"), method);
          break;
        }

        case "public_field_definition":
        case "field_definition": {
          const nameNode =
            member.childForFieldName("name") ?? member.childForFieldName("property");
          const memberName = propertyName(nameNode);
          if (memberName === undefined) continue;
          const value = member.childForFieldName("value");
          const isFunction = value !== null && FUNCTION_VALUES.has(value.type);
          const field = this.createSymbol(memberName, isFunction ? "method" : "property", member, {
            ...PLAIN,
            owner: classSymbol,
            decorators: memberDecorators,
          });
          if (isFunction && value) {
            this.attribution.set(nodeKey(member), field.id);
            this.collectNested(value, field);
          } else {
            // the initializer runs with the class; the annotation belongs to the field
            const annotation = member.childForFieldName("type");
            if (annotation) this.attribution.set(nodeKey(annotation), field.id);
          }
          break;
        }

        case "class_static_block":
          this.collectNested(member, classSymbol);
          break;
      }
    }
    return classSymbol;
  }

  private declareNamespace(node: SyntaxNode, options: DeclareOptions): SymbolRecord[] {
    const nameNode = node.childForFieldName("name");
    // ambient `module "pkg" {}` declarations describe other code
    if (!nameNode || nameNode.type === "string") return [];

    const namespace = this.createSymbol(nameNode.text, "namespace", node, options);
    this.attribution.set(nodeKey(node), namespace.id);

    const body = node.childForFieldName("body");
    for (const statement of body?.namedChildren ?? []) {
      if (statement.type === "export_statement") {
        const declaration = statement.childForFieldName("declaration");
        if (declaration) {
          this.declare(declaration, { ...PLAIN, owner: namespace, exported: true });
        }
      } else if (statement.type === "expression_statement") {
        const inner = statement.namedChildren[0];
        if (inner && (inner.type === "internal_module" || inner.type === "module")) {
          this.declare(inner, { ...PLAIN, owner: namespace });
        }
      } else if (DECLARATION_TYPES.has(statement.type)) {
        this.declare(statement, { ...PLAIN, owner: namespace });
      }
    }
    return [namespace];
  }

  private declareVariable(declarator: SyntaxNode, options: DeclareOptions): SymbolRecord[] {
    const nameNode = declarator.childForFieldName("name");
    const value = declarator.childForFieldName("value");
    if (!nameNode) return [];

    const moduleLevel = options.owner === undefined || options.owner.kind === "namespace";

    if (nameNode.type === "identifier") {
      if (value && FUNCTION_VALUES.has(value.type)) {
        const symbol = this.createSymbol(nameNode.text, "function", declarator, options);
        this.attribution.set(nodeKey(declarator), symbol.id);
        this.collectNested(value, symbol);
        return [symbol];
      }
      if (value && value.type === "class") {
        return [this.declareClass(value, nameNode.text, declarator, options)];
      }
      if (moduleLevel) {
        const symbol = this.createSymbol(nameNode.text, "variable", declarator, options);
        const annotation = declarator.childForFieldName("type");
        if (annotation) this.attribution.set(nodeKey(annotation), symbol.id);
        return [symbol];
      }
    } else if (moduleLevel) {
      return boundIdentifiers(nameNode).map((identifier) =>
        this.createSymbol(identifier.text, "variable", identifier, options)
      );
    }

    // a local value inside a function: not a symbol, but closures inside it are
    if (options.owner && value) this.collectNested(value, options.owner);
    return [];
  }

  /**
   * Declarations inside a function body (or a class's constructor and static
   * blocks). They become symbols owned by `owner`.
   */
  private collectNested(body: SyntaxNode | null, owner: SymbolRecord): void {
    if (!body) return;
    const visit = (node: SyntaxNode): boolean => {
      switch (node.type) {
        case "function_declaration":
        case "generator_function_declaration":
        case "class_declaration":
        case "abstract_class_declaration":
        case "lexical_declaration":
        case "variable_declaration":
          this.declare(node, { ...PLAIN, owner });
          return false;
        case "class":
          // anonymous class expressions stay part of their owner
          return false;
        default:
          return true;
      }
    };
    for (const child of body.namedChildren) walk(child, visit);
  }

  private createSymbol(
    name: string,
    kind: SymbolKind,
    node: SyntaxNode,
    options: DeclareOptions
  ): SymbolRecord {
    const owner = options.owner;
    const qualifiedName = owner ? `${owner.qualifiedName}.${name}` : name;
    const seen = this.qualifiedCounts.get(qualifiedName) ?? 0;
    this.qualifiedCounts.set(qualifiedName, seen + 1);

    const symbol: SymbolRecord = {
      id: `${this.unitPath}#${qualifiedName}${seen > 0 ? `~${seen + 1}` : ""}`,
      name,
      qualifiedName,
      kind,
      unitPath: this.unitPath,
      span: nodeToSpan(node),
      exported: options.exported,
      defaultExport: options.defaultExport,
      ownerId: owner?.id,
      decorators: options.decorators,
      evidence: new Set(),
    };
    if (options.decorators.length > 0) symbol.evidence.add("decorated");
    if (this.degraded) symbol.evidence.add("parse-degraded");
    this.symbols.push(symbol);

    if (!owner) {
      appendName(this.topLevel, name, symbol.id);
    } else {
      const classMember = owner.kind === "class" && (kind === "method" || kind === "property");
      if (classMember || owner.kind === "namespace") {
        appendName(scopeOf(this.members, owner.id), name, symbol.id);
      }
      // closures in constructors and static blocks are plain names, not members
      if (!classMember) {
        appendName(scopeOf(this.scopes, owner.id), name, symbol.id);
      }
    }
    return symbol;
  }

  private decoratorsOf(node: SyntaxNode): string[] {
    const names: string[] = [];
    for (const child of node.namedChildren) {
      if (child.type !== "decorator") continue;
      names.push(decoratorName(child));
      this.attribution.set(nodeKey(child), this.moduleSymbol.id);
    }
    return names;
  }

  // ---------------------------------------------------------------------------
  // Imports and exports
  // ---------------------------------------------------------------------------

  private readImport(node: SyntaxNode): void {
    const line = node.startPosition.row + 1;
    const requireClause = node.namedChildren.find((c) => c.type === "import_require_clause");
    if (requireClause) {
      // import x = require("y")
      const local = requireClause.namedChildren.find((c) => c.type === "identifier");
      const specifier = staticStringValue(
        requireClause.childForFieldName("source") ??
          requireClause.namedChildren.find((c) => c.type === "string")
      );
      if (!local || specifier === undefined) return;
      this.imports.push({
        specifier,
        bindings: [{ imported: "*", local: local.text, typeOnly: false }],
        typeOnly: false,
        reexport: false,
        sideEffect: false,
        line,
      });
      return;
    }

    const specifier = staticStringValue(node.childForFieldName("source"));
    if (specifier === undefined) return;

    const statementTypeOnly = node.children.some((c) => c.type === "type" || c.type === "typeof");
    const bindings: ImportBinding[] = [];
    const clause = node.namedChildren.find((c) => c.type === "import_clause");

    for (const part of clause?.namedChildren ?? []) {
      if (part.type === "identifier") {
        bindings.push({ imported: "default", local: part.text, typeOnly: statementTypeOnly });
      } else if (part.type === "namespace_import") {
        const local = part.namedChildren.find((c) => c.type === "identifier");
        if (local) bindings.push({ imported: "*", local: local.text, typeOnly: statementTypeOnly });
      } else if (part.type === "named_imports") {
        for (const spec of part.namedChildren) {
          if (spec.type !== "import_specifier") continue;
          const imported = moduleExportName(spec.childForFieldName("name"));
          if (imported === undefined) continue;
          bindings.push({
            imported,
            local: spec.childForFieldName("alias")?.text ?? imported,
            typeOnly: statementTypeOnly || spec.children.some((c) => c.type === "type"),
          });
        }
      }
    }

    this.imports.push({
      specifier,
      bindings,
      typeOnly: statementTypeOnly || (bindings.length > 0 && bindings.every((b) => b.typeOnly)),
      reexport: false,
      sideEffect: clause === undefined,
      line,
    });
  }

  private readExport(node: SyntaxNode): void {
    const decorators = this.decoratorsOf(node);
    const typeOnly = node.children.some((c) => c.type === "type");
    const isDefault = node.children.some((c) => c.type === "default");
    const source = node.childForFieldName("source");

    if (source) {
      this.readReexport(node, source, typeOnly);
      return;
    }

    const declaration = node.childForFieldName("declaration");
    if (declaration) {
      const declared = this.declare(declaration, {
        exported: true,
        defaultExport: isDefault,
        decorators,
      });
      for (const symbol of declared) {
        this.exports.push({
          kind: "local",
          exportedName: isDefault ? "default" : symbol.name,
          localName: symbol.name,
        });
      }
      return;
    }

    const value =
      node.childForFieldName("value") ??
      // `export = x` carries its expression without a field name
      (node.children.some((c) => c.type === "=")
        ? node.namedChildren.find((c) => c.type !== "decorator")
        : undefined);

    if (value && (isDefault || node.children.some((c) => c.type === "="))) {
      this.readDefaultValue(value, decorators);
      return;
    }

    const clause = node.namedChildren.find((c) => c.type === "export_clause");
    for (const spec of clause?.namedChildren ?? []) {
      if (spec.type !== "export_specifier") continue;
      const localName = moduleExportName(spec.childForFieldName("name"));
      if (localName === undefined) continue;
      const exportedName = moduleExportName(spec.childForFieldName("alias")) ?? localName;
      this.exports.push({ kind: "local", exportedName, localName });
    }
  }

  private readDefaultValue(value: SyntaxNode, decorators: string[]): void {
    const options: DeclareOptions = { exported: true, defaultExport: true, decorators };

    if (value.type === "identifier") {
      this.exports.push({ kind: "local", exportedName: "default", localName: value.text });
      return;
    }
    if (value.type === "class") {
      const name = fieldText(value, "name") ?? "default";
      this.declareClass(value, name, value, options);
      this.exports.push({ kind: "local", exportedName: "default", localName: name });
      return;
    }
    if (FUNCTION_VALUES.has(value.type)) {
      const name = fieldText(value, "name") ?? "default";
      const symbol = this.createSymbol(name, "function", value, options);
      this.attribution.set(nodeKey(value), symbol.id);
      this.collectNested(value.childForFieldName("body"), symbol);
      this.exports.push({ kind: "local", exportedName: "default", localName: name });
      return;
    }
    this.exports.push({ kind: "expression", exportedName: "default" });
  }

  private readReexport(node: SyntaxNode, source: SyntaxNode, typeOnly: boolean): void {
    const specifier = staticStringValue(source);
    if (specifier === undefined) return;

    const bindings: ImportBinding[] = [];
    const clause = node.namedChildren.find((c) => c.type === "export_clause");
    const namespaceExport = node.namedChildren.find((c) => c.type === "namespace_export");

    if (clause) {
      for (const spec of clause.namedChildren) {
        if (spec.type !== "export_specifier") continue;
        const importedName = moduleExportName(spec.childForFieldName("name"));
        if (importedName === undefined) continue;
        const exportedName = moduleExportName(spec.childForFieldName("alias")) ?? importedName;
        const specTypeOnly = typeOnly || spec.children.some((c) => c.type === "type");
        this.exports.push({ kind: "reexport", exportedName, specifier, importedName });
        bindings.push({ imported: importedName, local: exportedName, typeOnly: specTypeOnly });
      }
    } else if (namespaceExport) {
      const exportedName = moduleExportName(namespaceExport.namedChildren[0]);
      if (exportedName !== undefined) {
        this.exports.push({ kind: "namespace-reexport", exportedName, specifier });
        bindings.push({ imported: "*", local: exportedName, typeOnly });
      }
    } else {
      this.exports.push({ kind: "star", specifier });
    }

    this.imports.push({
      specifier,
      bindings,
      typeOnly: typeOnly || (bindings.length > 0 && bindings.every((b) => b.typeOnly)),
      reexport: true,
      sideEffect: false,
      line: node.startPosition.row + 1,
    });
  }

  /**
   * Resolve `export { x }` against what the unit declares. Exporting an
   * imported binding is a re-export in disguise.
   */
  private bindLocalExports(): void {
    const imported = new Map<string, { specifier: string; imported: string }>();
    for (const record of this.imports) {
      if (record.reexport) continue;
      for (const binding of record.bindings) {
        imported.set(binding.local, { specifier: record.specifier, imported: binding.imported });
      }
    }

    this.exports = this.exports.map((binding): ExportBinding => {
      if (binding.kind !== "local") return binding;

      const ids = this.topLevel.get(binding.localName);
      if (ids) {
        for (const symbol of this.symbols) {
          if (!ids.includes(symbol.id)) continue;
          symbol.exported = true;
          if (binding.exportedName === "default") symbol.defaultExport = true;
        }
        return binding;
      }

      const source = imported.get(binding.localName);
      if (!source) return binding;
      return source.imported === "*"
        ? { kind: "namespace-reexport", exportedName: binding.exportedName, specifier: source.specifier }
        : {
            kind: "reexport",
            exportedName: binding.exportedName,
            specifier: source.specifier,
            importedName: source.imported,
          };
    });
  }
}

function appendName(scope: Map<string, SymbolId[]>, name: string, id: SymbolId): void {
  const ids = scope.get(name);
  if (ids) ids.push(id);
  else scope.set(name, [id]);
}

function scopeOf(
  scopes: Map<SymbolId, Map<string, SymbolId[]>>,
  owner: SymbolId
): Map<string, SymbolId[]> {
  let scope = scopes.get(owner);
  if (!scope) {
    scope = new Map();
    scopes.set(owner, scope);
  }
  return scope;
}

function propertyName(node: SyntaxNode | null): string | undefined {
  if (!node) return undefined;
  switch (node.type) {
    case "property_identifier":
    case "private_property_identifier":
    case "identifier":
    case "number":
      return node.text;
    case "string":
      return staticStringValue(node);
    default:
      // computed names are only known at run time
      return undefined;
  }
}

function moduleExportName(node: SyntaxNode | null | undefined): string | undefined {
  if (!node) return undefined;
  return node.type === "string" ? staticStringValue(node) : node.text;
}

function decoratorName(decorator: SyntaxNode): string {
  const expression = decorator.namedChildren[0];
  if (!expression) return decorator.text.replace(/^@/, "");
  if (expression.type === "call_expression") {
    return expression.childForFieldName("function")?.text ?? expression.text;
  }
  return expression.text;
}

/** Identifiers a destructuring pattern binds. */
function boundIdentifiers(pattern: SyntaxNode): SyntaxNode[] {
  const found: SyntaxNode[] = [];
  walk(pattern, (node) => {
    switch (node.type) {
      case "identifier":
      case "shorthand_property_identifier_pattern":
        found.push(node);
        return false;
      case "assignment_pattern":
      case "object_assignment_pattern": {
        const left = node.childForFieldName("left");
        if (left) found.push(...boundIdentifiers(left));
        return false;
      }
      case "pair_pattern": {
        const value = node.childForFieldName("value");
        if (value) found.push(...boundIdentifiers(value));
        return false;
      }
      default:
        return true;
    }
  });
  return found;
}
