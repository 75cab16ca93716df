// ────────────────────────────────────────────────────────────
// Cache Manager Codegen Error Taxonomy
// Every error the user can hit, with a message + suggestion.
// ────────────────────────────────────────────────────────────

export class CacheManagerGenError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly userMessage: string,
        public readonly suggestion?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'CacheManagerGenError';
    }
}

export const ERRORS = {
    INVALID_PARAMETER: (param: string, detail: string) =>
        new CacheManagerGenError(
            `Invalid plugin parameter "${param}": ${detail}`,
            'INVALID_PARAMETER',
            `Plugin parameter "${param}" is not valid: ${detail}`,
            'Known keys: target, suffix, runtime_import, runtime_module, import_extension, paths, module, M<file>.',
        ),

    UNKNOWN_TARGET: (target: string) =>
        new CacheManagerGenError(
            `Unknown target: ${target}`,
            'UNKNOWN_TARGET',
            `Target "${target}" is not supported.`,
            'Supported targets: go, ts.',
        ),

    UNKNOWN_TYPE: (typeName: string, method: string) =>
        new CacheManagerGenError(
            `Unknown message type ${typeName} referenced by ${method}`,
            'UNKNOWN_TYPE',
            `Method ${method} references ${typeName}, which is not in the compilation request.`,
            'Make sure every imported .proto file is passed to protoc.',
        ),

    INVALID_CONFIG: (path: string, detail: string) =>
        new CacheManagerGenError(
            `Invalid config in ${path}: ${detail}`,
            'INVALID_CONFIG',
            `Config file ${path} is not valid.`,
            detail,
        ),

    FILE_NOT_FOUND: (path: string) =>
        new CacheManagerGenError(
            `File not found: ${path}`,
            'FILE_NOT_FOUND',
            `Could not find file: ${path}`,
            'Check the path and try again.',
        ),

    DESCRIPTOR_READ_FAILED: (path: string, detail: string) =>
        new CacheManagerGenError(
            `Failed to read descriptor set ${path}: ${detail}`,
            'DESCRIPTOR_READ_FAILED',
            `Could not decode ${path} as a FileDescriptorSet.`,
            'Produce it with: protoc --include_source_info --include_imports --descriptor_set_out=<file>',
        ),

    GENERATION_FAILED: (file: string, cause: unknown) =>
        new CacheManagerGenError(
            `generating file ${file}: ${errorMessage(cause)}`,
            'GENERATION_FAILED',
            `Could not generate the cache manager for ${file}.`,
            undefined,
            { cause },
        ),

    MODULE_MISMATCH: (file: string, module: string) =>
        new CacheManagerGenError(
            `${file}: generated file does not match prefix "${module}"`,
            'MODULE_MISMATCH',
            `Output ${file} does not live under module ${module}.`,
            'Check the go_package option or the M parameters, or drop module=.',
        ),

    WRITE_FAILED: (path: string, detail: string) =>
        new CacheManagerGenError(
            `Failed to write to ${path}: ${detail}`,
            'WRITE_FAILED',
            `Could not write output file: ${path}`,
            'Check file permissions and available disk space.',
        ),
} as const;

/** Message of any thrown value */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Type guard for CacheManagerGenError */
export function isCacheManagerGenError(err: unknown): err is CacheManagerGenError {
    return err instanceof CacheManagerGenError;
}

/** Format a CacheManagerGenError for CLI display */
export function formatError(err: CacheManagerGenError): string {
    let out = `\n✖ ${err.userMessage}`;
    if (err.suggestion) out += `\n  → ${err.suggestion}`;
    return out;
}
