export { decodeRequest, decodeFiles, goImportPath, goPackageName } from './decode.js';
export type { GoImportMap } from './decode.js';
export { commentBodies, commentText } from './comments.js';
