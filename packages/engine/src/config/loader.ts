import { cosmiconfig, cosmiconfigSync } from 'cosmiconfig';
import { z } from 'zod';
import type { GeneratorConfig, GoPathMode, ImportExtension } from '../types.js';
import { DEFAULT_SUFFIX } from '../types.js';
import { ERRORS, errorMessage } from '../errors.js';

// ── Default config ────────────────────────────────────────────

export function getDefaultConfig(): GeneratorConfig {
    return {
        target: 'ts',
        suffix: DEFAULT_SUFFIX,
        goRuntimeImport: 'github.com/NSXBet/go-cache-manager/pkg/gocachemanager',
        tsRuntimeModule: 'cache-manager-runtime',
        importExtension: '.js',
        goPaths: 'import',
        goModule: '',
        goImportMap: {},
    };
}

// ── Schema ────────────────────────────────────────────────────

export const ConfigFileSchema = z
    .object({
        target: z.enum(['go', 'ts']),
        suffix: z.string().min(1),
        goRuntimeImport: z.string().min(1),
        tsRuntimeModule: z.string().min(1),
        importExtension: z.enum(['.js', '.ts', '']),
        goPaths: z.enum(['import', 'source_relative']),
        goModule: z.string(),
        goImportMap: z.record(z.string(), z.string().min(1)),
    })
    .partial()
    .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

const SEARCH_PLACES = [
    '.cachemanagerrc.json',
    '.cachemanagerrc.yml',
    '.cachemanagerrc.yaml',
    'cachemanager.config.js',
    'package.json',
];

// cosmiconfigSync cannot load ES module config files
const SYNC_SEARCH_PLACES = SEARCH_PLACES.filter(place => !place.endsWith('.js'));

// ── Config loader (cosmiconfig) ───────────────────────────────

/**
 * Load the nearest config file using cosmiconfig.
 * A missing file yields an empty override; an invalid one throws INVALID_CONFIG.
 *
 * Supported locations (in priority order):
 *   .cachemanagerrc.json, .cachemanagerrc.yml, .cachemanagerrc.yaml,
 *   cachemanager.config.js,
 *   package.json (under "cachemanager" key)
 */
export async function loadConfigFile(searchFrom?: string): Promise<ConfigFile> {
    const explorer = cosmiconfig('cachemanager', { searchPlaces: SEARCH_PLACES });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (err) {
        throw ERRORS.INVALID_CONFIG(searchFrom ?? process.cwd(), errorMessage(err));
    }

    if (!result || result.isEmpty) return {};
    return validateConfigFile(result.config, result.filepath);
}

/**
 * Synchronous version — the protoc plugin runs synchronously.
 * Skips cachemanager.config.js, which only the async loader can import.
 */
export function loadConfigFileSync(searchFrom?: string): ConfigFile {
    const explorer = cosmiconfigSync('cachemanager', { searchPlaces: SYNC_SEARCH_PLACES });

    let result: ReturnType<typeof explorer.search>;
    try {
        result = explorer.search(searchFrom ?? process.cwd());
    } catch (err) {
        throw ERRORS.INVALID_CONFIG(searchFrom ?? process.cwd(), errorMessage(err));
    }

    if (!result || result.isEmpty) return {};
    return validateConfigFile(result.config, result.filepath);
}

export function validateConfigFile(raw: unknown, filepath: string): ConfigFile {
    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw ERRORS.INVALID_CONFIG(filepath, detail);
    }
    return parsed.data;
}

// ── Plugin parameter ──────────────────────────────────────────

/**
 * Parse the protoc plugin parameter, e.g. "target=go,suffix=Cache".
 *   target=go|ts
 *   suffix=<marker>
 *   runtime_import=<go import path>
 *   runtime_module=<ts module specifier>
 *   import_extension=.js|.ts|none
 *   paths=import|source_relative   (Go output layout)
 *   module=<go import path prefix>  (stripped from Go output names)
 *   M<file.proto>=<go import path>  (overrides go_package)
 */
export function parsePluginParameter(parameter: string): Partial<GeneratorConfig> {
    const out: Partial<GeneratorConfig> = {};

    for (const raw of parameter.split(',')) {
        const pair = raw.trim();
        if (!pair) continue;

        const eq = pair.indexOf('=');
        const key = eq >= 0 ? pair.slice(0, eq).trim() : pair;
        const value = eq >= 0 ? pair.slice(eq + 1).trim() : '';
        if (!value) throw ERRORS.INVALID_PARAMETER(pair, 'missing value');

        if (key.startsWith('M') && key.length > 1) {
            out.goImportMap = { ...out.goImportMap, [key.slice(1)]: value };
            continue;
        }

        switch (key) {
            case 'target':
                if (value !== 'go' && value !== 'ts') throw ERRORS.UNKNOWN_TARGET(value);
                out.target = value;
                break;
            case 'suffix':
                out.suffix = value;
                break;
            case 'runtime_import':
                out.goRuntimeImport = value;
                break;
            case 'runtime_module':
                out.tsRuntimeModule = value;
                break;
            case 'import_extension':
                out.importExtension = parseImportExtension(pair, value);
                break;
            case 'paths':
                out.goPaths = parseGoPaths(pair, value);
                break;
            case 'module':
                out.goModule = value;
                break;
            default:
                throw ERRORS.INVALID_PARAMETER(pair, `unknown key "${key}"`);
        }
    }

    return out;
}

function parseImportExtension(pair: string, value: string): ImportExtension {
    switch (value) {
        case '.js':
        case '.ts':
            return value;
        case 'none':
            return '';
        default:
            throw ERRORS.INVALID_PARAMETER(pair, 'expected .js, .ts or none');
    }
}

function parseGoPaths(pair: string, value: string): GoPathMode {
    if (value === 'import' || value === 'source_relative') return value;
    throw ERRORS.INVALID_PARAMETER(pair, 'expected import or source_relative');
}

// ── Merge helpers ─────────────────────────────────────────────

/**
 * Later layers win: defaults ← config file ← parameter / flags.
 * M mappings merge per file.
 */
export function resolveConfig(...layers: ReadonlyArray<Partial<GeneratorConfig>>): GeneratorConfig {
    const config = getDefaultConfig();
    for (const layer of layers) {
        if (layer.target !== undefined) config.target = layer.target;
        if (layer.suffix !== undefined) config.suffix = layer.suffix;
        if (layer.goRuntimeImport !== undefined) config.goRuntimeImport = layer.goRuntimeImport;
        if (layer.tsRuntimeModule !== undefined) config.tsRuntimeModule = layer.tsRuntimeModule;
        if (layer.importExtension !== undefined) config.importExtension = layer.importExtension;
        if (layer.goPaths !== undefined) config.goPaths = layer.goPaths;
        if (layer.goModule !== undefined) config.goModule = layer.goModule;
        if (layer.goImportMap !== undefined) config.goImportMap = { ...config.goImportMap, ...layer.goImportMap };
    }

    if (config.goModule && config.goPaths === 'source_relative') {
        throw ERRORS.INVALID_PARAMETER(`module=${config.goModule}`, 'cannot be combined with paths=source_relative');
    }
    return config;
}
