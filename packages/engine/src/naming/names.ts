// ── Identifier derivations ────────────────────────────────────
// Pure string transforms shared by every target renderer.

export function managerName(serviceName: string): string {
  if (serviceName.length === 0) return '';
  return `${serviceName}Manager`;
}

/** Lower-case the first character: "OrderCacheManager" → "orderCacheManager" */
export function privateFieldName(name: string): string {
  const [first, ...rest] = Array.from(name);
  if (first === undefined) return '';
  return first.toLowerCase() + rest.join('');
}

export function compositeFieldName(privateName: string, methodName: string): string {
  return `${privateName}_${methodName}`;
}

export function constructorName(manager: string): string {
  return `New${manager}`;
}

export function updateFnName(methodName: string): string {
  return `update${methodName}Fn`;
}

export function getterName(methodName: string): string {
  return `Get${methodName}`;
}

export function refresherName(methodName: string): string {
  return `Refresh${methodName}`;
}

/** Logical cache name handed to the runtime constructor */
export function cacheLogicalName(methodName: string): string {
  return methodName.toLowerCase();
}

/** Field holding the cache handle of one method of a service */
export function handleFieldName(serviceName: string, methodName: string): string {
  return compositeFieldName(privateFieldName(managerName(serviceName)), methodName);
}

const isLower = (c: string | undefined): boolean => c !== undefined && c >= 'a' && c <= 'z';
const isDigit = (c: string): boolean => c >= '0' && c <= '9';

/**
 * Go identifier protoc-gen-go derives from a proto name:
 * "get_order" → "GetOrder", "Order.Line" → "Order_Line", "_id" → "XId".
 */
export function goCamelCase(name: string): string {
  let out = '';
  for (let i = 0; i < name.length; i++) {
    const c = name.charAt(i);
    const next = name[i + 1];
    if (c === '.' && isLower(next)) {
      continue;
    } else if (c === '.') {
      out += '_';
    } else if (c === '_' && (i === 0 || name[i - 1] === '.')) {
      out += 'X';
    } else if (c === '_' && isLower(next)) {
      continue;
    } else if (isDigit(c)) {
      out += c;
    } else {
      out += isLower(c) ? c.toUpperCase() : c;
      while (isLower(name[i + 1])) {
        out += name.charAt(i + 1);
        i++;
      }
    }
  }
  return out;
}
