import type { FileDescriptorProto } from '@bufbuild/protobuf/wkt';

/** Leading comments of one file, keyed by joined SourceCodeInfo path */
export type CommentIndex = ReadonlyMap<string, string>;

export function indexComments(file: FileDescriptorProto): CommentIndex {
    const index = new Map<string, string>();
    for (const location of file.sourceCodeInfo?.location ?? []) {
        if (location.leadingComments) {
            index.set(location.path.join('.'), location.leadingComments);
        }
    }
    return index;
}

/** Returns undefined when the element carries no leading comment */
export function leadingComment(index: CommentIndex, path: ReadonlyArray<number>): string | undefined {
    return index.get(path.join('.'));
}

/**
 * Split a raw leading comment into comment bodies, the way protoc would
 * print it back: one body per line, the text that follows "//".
 *   " Fetches an order.\n More.\n" → [" Fetches an order.", " More."]
 */
export function commentBodies(raw: string): string[] {
    return raw.replace(/\n$/, '').split('\n');
}

/** Comment text with the marker spacing removed from each line */
export function commentText(raw: string): string {
    return commentBodies(raw)
        .map(line => (line.startsWith(' ') ? line.slice(1) : line))
        .join('\n');
}
