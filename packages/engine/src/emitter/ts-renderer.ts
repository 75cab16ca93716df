import { posix } from 'node:path';
import type {
    DocLines,
    FileDescriptor,
    GeneratorConfig,
    ManagerPlan,
    ServiceDescriptor,
    TargetRenderer,
    TypeRef,
} from '../types.js';
import { GENERATED_HEADER } from '../types.js';

// ────────────────────────────────────────────────────────────
// TypeScript target — emits <prefix>_cache_manager.ts on top of
// protobuf-es messages (<proto>_pb) and the runtime contract:
//   newCacheManager(name, zero, update, ...options): CacheManager<I, O>
//   CacheManager#fetch / CacheManager#forceRefresh
// ────────────────────────────────────────────────────────────

export const tsRenderer: TargetRenderer = {
    target: 'ts',

    // protobuf-es keeps proto names: nested messages join with "_"
    nameService(service: ServiceDescriptor): ServiceDescriptor {
        return service;
    },

    fileName(file: FileDescriptor): string {
        return `${file.filenamePrefix}_cache_manager.ts`;
    },

    render(file: FileDescriptor, plans: ReadonlyArray<ManagerPlan>, config: GeneratorConfig): string {
        const lines: string[] = [
            GENERATED_HEADER,
            `// @generated from file ${file.name} (package ${file.protoPackage || '(none)'})`,
            '/* eslint-disable */',
            '',
        ];

        const names = bindNames(tsRenderer.fileName(file, config), plans, config);
        renderImports(lines, names, config);

        for (const plan of plans) {
            renderClass(lines, plan, names);
            renderConstructor(lines, plan, names);
        }

        return lines.join('\n');
    },
};

// ── Identifiers ───────────────────────────────────────────────

/** Well-known types ship with protobuf-es instead of a generated _pb module */
const WKT_MODULE = '@bufbuild/protobuf/wkt';
const PROTOBUF_MODULE = '@bufbuild/protobuf';

/** Local names claimed in the generated module; clashes get a "$n" suffix */
class IdentifierScope {
    private readonly taken = new Set<string>();

    reserve(name: string): void {
        this.taken.add(name);
    }

    claim(preferred: string): string {
        let name = preferred;
        for (let n = 1; this.taken.has(name); n++) name = `${preferred}$${n}`;
        this.taken.add(name);
        return name;
    }
}

/** One imported symbol: the exported name and the local binding */
interface Binding {
    readonly imported: string;
    readonly local: string;
}

interface RuntimeNames {
    readonly create: string;
    readonly newCacheManager: string;
    readonly CacheManager: string;
    readonly CacheOption: string;
    readonly Context: string;
}

interface FileNames {
    readonly hasMethods: boolean;
    readonly runtime: RuntimeNames;
    /** Message type binding per fully-qualified name */
    readonly types: ReadonlyMap<string, Binding>;
    /** Schema binding per fully-qualified name, for messages built with create() */
    readonly schemas: ReadonlyMap<string, Binding>;
    /** Module specifier per fully-qualified name */
    readonly modules: ReadonlyMap<string, string>;
}

/**
 * Bind every identifier the module imports. Generated declarations keep their
 * names, messages come next in order of first use, runtime symbols last.
 */
function bindNames(outputName: string, plans: ReadonlyArray<ManagerPlan>, config: GeneratorConfig): FileNames {
    const scope = new IdentifierScope();
    for (const plan of plans) {
        scope.reserve(plan.managerName);
        scope.reserve(plan.constructorName);
    }

    const types = new Map<string, Binding>();
    const schemas = new Map<string, Binding>();
    const modules = new Map<string, string>();

    const use = (ref: TypeRef, asValue: boolean) => {
        const type = types.get(ref.fullName) ?? { imported: ref.localName, local: scope.claim(ref.localName) };
        types.set(ref.fullName, type);
        modules.set(ref.fullName, messageModule(outputName, ref.file, config));
        if (asValue && !schemas.has(ref.fullName)) {
            schemas.set(ref.fullName, { imported: `${ref.localName}Schema`, local: scope.claim(`${type.local}Schema`) });
        }
    };

    for (const plan of plans) {
        for (const field of plan.fields) {
            use(field.method.input, false);
            use(field.method.output, true);
        }
    }

    const hasMethods = plans.some(plan => plan.fields.length > 0);
    const runtimeName = (name: string) => (hasMethods || name === 'CacheOption' ? scope.claim(name) : name);

    return {
        hasMethods,
        runtime: {
            create: runtimeName('create'),
            newCacheManager: runtimeName('newCacheManager'),
            CacheManager: runtimeName('CacheManager'),
            CacheOption: runtimeName('CacheOption'),
            Context: runtimeName('Context'),
        },
        types,
        schemas,
        modules,
    };
}

// ── Imports ───────────────────────────────────────────────────

interface ModuleImports {
    values: Binding[];
    types: Binding[];
}

function renderImports(lines: string[], names: FileNames, config: GeneratorConfig): void {
    const runtime = JSON.stringify(config.tsRuntimeModule);
    const { create, newCacheManager, CacheManager, CacheOption, Context } = names.runtime;

    if (names.hasMethods) {
        lines.push(`import { ${clause({ imported: 'create', local: create })} } from "${PROTOBUF_MODULE}";`);
        lines.push(`import { ${clause({ imported: 'newCacheManager', local: newCacheManager })} } from ${runtime};`);
        lines.push(`import type { ${[
            { imported: 'CacheManager', local: CacheManager },
            { imported: 'CacheOption', local: CacheOption },
            { imported: 'Context', local: Context },
        ].map(clause).join(', ')} } from ${runtime};`);
    } else {
        lines.push(`import type { ${clause({ imported: 'CacheOption', local: CacheOption })} } from ${runtime};`);
    }

    const messages = new Map<string, ModuleImports>();
    const entryFor = (fullName: string): ModuleImports => {
        const specifier = names.modules.get(fullName) ?? '';
        const entry = messages.get(specifier) ?? { values: [], types: [] };
        messages.set(specifier, entry);
        return entry;
    };
    for (const [fullName, binding] of names.types) entryFor(fullName).types.push(binding);
    for (const [fullName, binding] of names.schemas) entryFor(fullName).values.push(binding);

    for (const specifier of [...messages.keys()].sort()) {
        const entry = messages.get(specifier);
        if (!entry) continue;
        if (entry.values.length > 0) {
            lines.push(`import { ${sortedClauses(entry.values)} } from ${JSON.stringify(specifier)};`);
        }
        lines.push(`import type { ${sortedClauses(entry.types)} } from ${JSON.stringify(specifier)};`);
    }

    lines.push('');
}

/** Specifier of the protobuf-es module declaring a message */
function messageModule(outputName: string, protoFile: string, config: GeneratorConfig): string {
    if (protoFile.startsWith('google/protobuf/')) return WKT_MODULE;
    const target = `${protoFile.replace(/\.proto$/, '')}_pb${config.importExtension}`;
    const relative = posix.relative(posix.dirname(outputName), target);
    return relative.startsWith('.') ? relative : `./${relative}`;
}

function clause(binding: Binding): string {
    return binding.imported === binding.local ? binding.local : `${binding.imported} as ${binding.local}`;
}

function sortedClauses(bindings: ReadonlyArray<Binding>): string {
    return bindings.map(clause).sort().join(', ');
}

// ── Declarations ──────────────────────────────────────────────

function renderClass(lines: string[], plan: ManagerPlan, names: FileNames): void {
    pushDoc(lines, plan.typeDoc, '');
    lines.push(`export class ${plan.managerName} {`);
    lines.push('  constructor(');
    for (const field of plan.fields) {
        lines.push(`    private readonly ${field.name}: ${handleType(names, field.method.input, field.method.output)},`);
    }
    lines.push('  ) {}');

    for (const wrapper of plan.wrappers) {
        const { input, output } = wrapper.method;
        const call = wrapper.kind === 'get' ? 'fetch' : 'forceRefresh';

        lines.push('');
        pushDoc(lines, wrapper.doc, '  ');
        lines.push(
            `  ${wrapper.name}(ctx: ${names.runtime.Context}, input: ${typeName(names, input)}): Promise<${typeName(names, output)}> {`,
            `    return this.${wrapper.field}.${call}(ctx, input);`,
            '  }',
        );
    }

    lines.push('}', '');
}

function renderConstructor(lines: string[], plan: ManagerPlan, names: FileNames): void {
    const { runtime } = names;

    pushDoc(lines, plan.constructorDoc, '');
    lines.push(`export function ${plan.constructorName}(`);
    for (const param of plan.updateParams) {
        const { input, output } = param.method;
        lines.push(`  ${param.name}: (ctx: ${runtime.Context}, input: ${typeName(names, input)}) => Promise<${typeName(names, output)}>,`);
    }
    lines.push(`  ...options: ${runtime.CacheOption}[]`);
    lines.push(`): ${plan.managerName} {`);

    for (const c of plan.constructions) {
        const input = typeName(names, c.method.input);
        const output = typeName(names, c.method.output);
        const schema = names.schemas.get(c.method.output.fullName)?.local ?? `${output}Schema`;
        lines.push(
            `  let ${c.variable}: ${handleType(names, c.method.input, c.method.output)};`,
            '  try {',
            `    ${c.variable} = ${runtime.newCacheManager}<${input}, ${output}>(`,
            `      ${JSON.stringify(c.cacheName)},`,
            `      () => ${runtime.create}(${schema}),`,
            `      ${c.updateParam},`,
            '      ...options,',
            '    );',
            '  } catch (err) {',
            `    throw new Error(\`creating cache manager ${c.method.name}: \${err instanceof Error ? err.message : String(err)}\`, { cause: err });`,
            '  }',
            '',
        );
    }

    if (plan.fields.length === 0) {
        lines.push(`  return new ${plan.managerName}();`);
    } else {
        lines.push(`  return new ${plan.managerName}(`);
        for (const field of plan.fields) lines.push(`    ${field.name},`);
        lines.push('  );');
    }
    lines.push('}', '');
}

// ── Helpers ───────────────────────────────────────────────────

function typeName(names: FileNames, ref: TypeRef): string {
    return names.types.get(ref.fullName)?.local ?? ref.localName;
}

function handleType(names: FileNames, input: TypeRef, output: TypeRef): string {
    return `${names.runtime.CacheManager}<${typeName(names, input)}, ${typeName(names, output)}>`;
}

function pushDoc(lines: string[], doc: DocLines | undefined, indent: string): void {
    if (!doc) return;
    lines.push(`${indent}/**`);
    for (const body of doc) lines.push(`${indent} *${body.replace(/\*\//g, '*\\/')}`);
    lines.push(`${indent} */`);
}
