import type {
    CacheConstruction,
    DocLines,
    ManagerField,
    ManagerPlan,
    MethodDescriptor,
    ServiceDescriptor,
    UpdateParam,
    WrapperMethod,
} from '../types.js';
import {
    cacheLogicalName,
    constructorName,
    getterName,
    handleFieldName,
    managerName,
    refresherName,
    updateFnName,
} from '../naming/index.js';
import { commentBodies, commentText } from '../descriptor/comments.js';

export const REFRESH_DOC_PREAMBLE = 'Eagerly refresh the cache for the method that:';

// ── Public API ────────────────────────────────────────────────

/**
 * Describe the manager generated for one candidate service.
 * Every list follows the service's method declaration order.
 */
export function buildManagerPlan(service: ServiceDescriptor): ManagerPlan {
    const manager = managerName(service.name);
    const ctor = constructorName(manager);

    const fields: ManagerField[] = [];
    const updateParams: UpdateParam[] = [];
    const constructions: CacheConstruction[] = [];
    const wrappers: WrapperMethod[] = [];

    for (const method of service.methods) {
        const field = handleFieldName(service.name, method.name);
        const updateParam = updateFnName(method.name);

        fields.push({ name: field, method });
        updateParams.push({ name: updateParam, method });
        constructions.push({
            variable: field,
            cacheName: cacheLogicalName(method.name),
            updateParam,
            method,
        });
        wrappers.push(
            { kind: 'get', name: getterName(method.name), field, method, doc: getDoc(method) },
            { kind: 'refresh', name: refresherName(method.name), field, method, doc: refreshDoc(method) },
        );
    }

    return {
        service,
        managerName: manager,
        constructorName: ctor,
        typeDoc: prefixedDoc(service.leadingComment, `${manager} for every operation related to this service:`),
        constructorDoc: prefixedDoc(service.leadingComment, `${ctor} is the constructor method for this service:`),
        fields,
        updateParams,
        constructions,
        wrappers,
    };
}

// ── Doc comments ──────────────────────────────────────────────

function prefixedDoc(raw: string | undefined, preamble: string): DocLines | undefined {
    if (raw === undefined) return undefined;
    return [` ${preamble}`, ...commentBodies(raw)];
}

/** "Get" + the comment text, so "GetOrder fetches…" documents GetGetOrder */
function getDoc(method: MethodDescriptor): DocLines | undefined {
    if (method.leadingComment === undefined) return undefined;
    const text = `Get${commentText(method.leadingComment)}`.replace(/ +$/, '');
    return text.split('\n').map(line => (line ? ` ${line}` : ''));
}

function refreshDoc(method: MethodDescriptor): DocLines | undefined {
    return prefixedDoc(method.leadingComment, REFRESH_DOC_PREAMBLE);
}
