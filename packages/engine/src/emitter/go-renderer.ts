import { posix } from 'node:path';
import type {
    DocLines,
    FileDescriptor,
    GeneratorConfig,
    ManagerPlan,
    MethodDescriptor,
    ServiceDescriptor,
    TargetRenderer,
    TypeRef,
} from '../types.js';
import { GENERATED_HEADER } from '../types.js';
import { goCamelCase } from '../naming/index.js';
import { ERRORS } from '../errors.js';

// ────────────────────────────────────────────────────────────
// Go target — emits <prefix>_cache_manager.pb.go, calling the
// runtime's NewCacheManager / Get / Refresh.
// ────────────────────────────────────────────────────────────

const RUNTIME_PKG = 'gocachemanager';

export const goRenderer: TargetRenderer = {
    target: 'go',

    nameService(service: ServiceDescriptor): ServiceDescriptor {
        return {
            ...service,
            name: goCamelCase(service.name),
            methods: service.methods.map(goMethod),
        };
    },

    /**
     * paths=import places the file under the Go import path, minus module=;
     * paths=source_relative keeps it beside the .proto.
     */
    fileName(file: FileDescriptor, config: GeneratorConfig): string {
        const name = config.goPaths === 'import'
            ? `${posix.join(file.goImportPath, posix.basename(file.filenamePrefix))}_cache_manager.pb.go`
            : `${file.filenamePrefix}_cache_manager.pb.go`;

        if (!config.goModule || config.goPaths !== 'import') return name;

        const prefix = `${config.goModule}/`;
        if (!name.startsWith(prefix)) throw ERRORS.MODULE_MISMATCH(name, config.goModule);
        return name.slice(prefix.length);
    },

    render(file: FileDescriptor, plans: ReadonlyArray<ManagerPlan>, config: GeneratorConfig): string {
        const lines: string[] = [
            GENERATED_HEADER,
            `// source: ${file.name}`,
            '',
            `package ${file.goPackageName}`,
            '',
            'import (',
            '\t"context"',
            '\t"fmt"',
            '',
            `\t${RUNTIME_PKG} "${config.goRuntimeImport}"`,
            ')',
            '',
        ];

        // context and fmt are only referenced through methods
        if (plans.every(plan => plan.fields.length === 0)) {
            lines.push(
                '// Reference imports to suppress errors if they are not otherwise used.',
                'var _ = context.Background',
                'var _ = fmt.Errorf',
                '',
            );
        }

        for (const plan of plans) {
            renderType(lines, plan);
            renderConstructor(lines, plan);
            renderWrappers(lines, plan);
        }

        return lines.join('\n');
    },
};

// ── Declarations ──────────────────────────────────────────────

function renderType(lines: string[], plan: ManagerPlan): void {
    pushDoc(lines, plan.typeDoc);
    lines.push(`type ${plan.managerName} struct {`);
    for (const field of plan.fields) {
        lines.push(`\t${field.name} ${handleType(field.method.input.localName, field.method.output.localName)}`);
    }
    lines.push('}', '');
}

function renderConstructor(lines: string[], plan: ManagerPlan): void {
    pushDoc(lines, plan.constructorDoc);
    lines.push(`func ${plan.constructorName}(`);
    for (const param of plan.updateParams) {
        const { input, output } = param.method;
        lines.push(`\t${param.name} func(context.Context, *${input.localName}) (*${output.localName}, error),`);
    }
    lines.push(`\toptions ...${RUNTIME_PKG}.CacheOption,`);
    lines.push(`) (*${plan.managerName}, error) {`);

    for (const c of plan.constructions) {
        const { input, output } = c.method;
        lines.push(
            `\t${c.variable}, err := ${RUNTIME_PKG}.NewCacheManager[*${input.localName}, *${output.localName}](`,
            `\t\t${JSON.stringify(c.cacheName)},`,
            `\t\tfunc() *${output.localName} { return &${output.localName}{} },`,
            `\t\t${c.updateParam},`,
            '\t\toptions...,',
            '\t)',
            '\tif err != nil {',
            `\t\treturn nil, fmt.Errorf("creating cache manager %s: %w", ${JSON.stringify(c.method.name)}, err)`,
            '\t}',
            '',
        );
    }

    lines.push(`\treturn &${plan.managerName}{`);
    for (const field of plan.fields) {
        lines.push(`\t\t${field.name}: ${field.name},`);
    }
    lines.push('\t}, nil', '}', '');
}

function renderWrappers(lines: string[], plan: ManagerPlan): void {
    for (const wrapper of plan.wrappers) {
        const { input, output } = wrapper.method;
        const call = wrapper.kind === 'get' ? 'Get' : 'Refresh';

        pushDoc(lines, wrapper.doc);
        lines.push(
            `func (cm *${plan.managerName}) ${wrapper.name}(`,
            '\tctx context.Context,',
            `\tinput *${input.localName},`,
            `) (*${output.localName}, error) {`,
            `\treturn cm.${wrapper.field}.${call}(ctx, input)`,
            '}',
            '',
        );
    }
}

// ── Helpers ───────────────────────────────────────────────────

function goMethod(method: MethodDescriptor): MethodDescriptor {
    return {
        ...method,
        name: goCamelCase(method.name),
        parent: goCamelCase(method.parent),
        input: goType(method.input),
        output: goType(method.output),
    };
}

/** Nested messages join their Go names with "_": Order.Line → Order_Line */
function goType(ref: TypeRef): TypeRef {
    return { ...ref, localName: goCamelCase(ref.scopedName) };
}

function handleType(input: string, output: string): string {
    return `*${RUNTIME_PKG}.CacheManager[*${input}, *${output}]`;
}

function pushDoc(lines: string[], doc: DocLines | undefined): void {
    if (!doc) return;
    for (const body of doc) lines.push(`//${body}`);
}
