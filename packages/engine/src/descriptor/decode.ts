import { posix } from 'node:path';
import type {
    CodeGeneratorRequest,
    DescriptorProto,
    FileDescriptorProto,
    MethodDescriptorProto,
    ServiceDescriptorProto,
} from '@bufbuild/protobuf/wkt';
import type { FileDescriptor, MethodDescriptor, ServiceDescriptor, TypeRef } from '../types.js';
import { ERRORS } from '../errors.js';
import { leadingComment, type CommentIndex, indexComments } from './comments.js';

// Field numbers used in SourceCodeInfo paths
const FILE_SERVICE = 6;
const SERVICE_METHOD = 2;

type TypeIndex = ReadonlyMap<string, TypeRef>;

// ── Public API ────────────────────────────────────────────────

/** go_package values keyed by proto file name, overriding the files' own option */
export type GoImportMap = Readonly<Record<string, string>>;

/**
 * Decode every proto file of a plugin request into read-only descriptors.
 * Files listed in file_to_generate are flagged for generation.
 */
export function decodeRequest(request: CodeGeneratorRequest, goImportMap: GoImportMap = {}): FileDescriptor[] {
    return decodeFiles(request.protoFile, request.fileToGenerate, goImportMap);
}

/**
 * Decode a set of FileDescriptorProtos. Message types are resolved across
 * the whole set, so imported files must be part of it.
 */
export function decodeFiles(
    protoFiles: ReadonlyArray<FileDescriptorProto>,
    fileToGenerate: ReadonlyArray<string>,
    goImportMap: GoImportMap = {},
): FileDescriptor[] {
    const types = indexTypes(protoFiles);
    const toGenerate = new Set(fileToGenerate);

    return protoFiles.map(file => decodeFile(file, toGenerate.has(file.name), types, goImportMap[file.name]));
}

// ── File / service / method ──────────────────────────────────

function decodeFile(
    file: FileDescriptorProto,
    generate: boolean,
    types: TypeIndex,
    goPackageOverride: string | undefined,
): FileDescriptor {
    const comments = indexComments(file);
    const goPackage = goPackageOverride ?? file.options?.goPackage ?? '';

    return {
        name: file.name,
        protoPackage: file.package,
        generate,
        filenamePrefix: file.name.replace(/\.proto$/, ''),
        goPackageName: goPackageName(file, goPackage),
        goImportPath: goImportPath(file, goPackage),
        services: file.service.map((service, index) => decodeService(service, [FILE_SERVICE, index], comments, types)),
    };
}

function decodeService(
    service: ServiceDescriptorProto,
    path: number[],
    comments: CommentIndex,
    types: TypeIndex,
): ServiceDescriptor {
    return {
        name: service.name,
        leadingComment: leadingComment(comments, path),
        methods: service.method.map((method, index) =>
            decodeMethod(method, service.name, [...path, SERVICE_METHOD, index], comments, types)),
    };
}

function decodeMethod(
    method: MethodDescriptorProto,
    parent: string,
    path: number[],
    comments: CommentIndex,
    types: TypeIndex,
): MethodDescriptor {
    const qualified = `${parent}.${method.name}`;

    return {
        name: method.name,
        parent,
        input: resolveType(types, method.inputType, qualified),
        output: resolveType(types, method.outputType, qualified),
        leadingComment: leadingComment(comments, path),
        clientStreaming: method.clientStreaming,
        serverStreaming: method.serverStreaming,
    };
}

// ── Type resolution ──────────────────────────────────────────

function indexTypes(protoFiles: ReadonlyArray<FileDescriptorProto>): TypeIndex {
    const index = new Map<string, TypeRef>();

    const visit = (file: FileDescriptorProto, message: DescriptorProto, scope: string[]) => {
        const local = [...scope, message.name];
        const fullName = file.package ? `${file.package}.${local.join('.')}` : local.join('.');
        index.set(fullName, { fullName, localName: local.join('_'), scopedName: local.join('.'), file: file.name });
        for (const nested of message.nestedType) visit(file, nested, local);
    };

    for (const file of protoFiles) {
        for (const message of file.messageType) visit(file, message, []);
    }

    return index;
}

function resolveType(types: TypeIndex, typeName: string, method: string): TypeRef {
    const ref = types.get(typeName.replace(/^\./, ''));
    if (!ref) throw ERRORS.UNKNOWN_TYPE(typeName, method);
    return ref;
}

// ── Go package name ──────────────────────────────────────────

/**
 * go_package "example.com/shop/v1;shopv1" → "shopv1"
 * go_package "example.com/shop/v1"        → "v1"
 * package shop.v1                        → "shop_v1"
 */
export function goPackageName(file: FileDescriptorProto, goPackage: string = file.options?.goPackage ?? ''): string {
    if (goPackage) {
        const semi = goPackage.lastIndexOf(';');
        if (semi >= 0) return sanitizeGoIdent(goPackage.slice(semi + 1));
        return sanitizeGoIdent(goPackage.slice(goPackage.lastIndexOf('/') + 1));
    }

    if (file.package) return sanitizeGoIdent(file.package.replace(/\./g, '_'));

    const base = file.name.replace(/\.proto$/, '');
    return sanitizeGoIdent(base.slice(base.lastIndexOf('/') + 1));
}

/**
 * go_package "example.com/shop/v1;shopv1" → "example.com/shop/v1"
 * without go_package the directory of the .proto stands in
 */
export function goImportPath(file: FileDescriptorProto, goPackage: string = file.options?.goPackage ?? ''): string {
    const semi = goPackage.lastIndexOf(';');
    const importPath = semi >= 0 ? goPackage.slice(0, semi) : goPackage;
    return importPath || posix.dirname(file.name);
}

function sanitizeGoIdent(name: string): string {
    const ident = name.replace(/[^a-zA-Z0-9_]/g, '_');
    return /^[0-9]/.test(ident) ? `_${ident}` : ident;
}
