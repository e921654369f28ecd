type Container = Record<string, unknown> | unknown[];
type Segment = string | number;

export const FIELD_PATH_PATTERN = /^[a-z_][a-z0-9_]*(\.([a-z_][a-z0-9_]*|\d+))*$/;

function isContainer(value: unknown): value is Container {
  return typeof value === "object" && value !== null;
}

export function parseFieldPath(path: string): Segment[] {
  return path.split(".").map((segment) => (/^\d+$/.test(segment) ? Number(segment) : segment));
}

function readChild(container: Container, key: Segment): unknown {
  return Array.isArray(container) ? container[Number(key)] : container[String(key)];
}

function writeChild(container: Container, key: Segment, value: unknown): void {
  if (Array.isArray(container)) {
    container[Number(key)] = value;
  } else {
    container[String(key)] = value;
  }
}

/**
 * Writes `value` at a dotted path such as `location.0.quantity`, creating
 * objects for named segments and arrays for numeric ones.
 */
export function setPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const segments = parseFieldPath(path);
  let current: Container = target;
  for (let i = 0; i < segments.length - 1; i++) {
    const child = readChild(current, segments[i]);
    if (isContainer(child)) {
      current = child;
      continue;
    }
    const created: Container = typeof segments[i + 1] === "number" ? [] : {};
    writeChild(current, segments[i], created);
    current = created;
  }
  writeChild(current, segments[segments.length - 1], value);
}

export function getPath(target: Record<string, unknown>, path: string): unknown {
  let current: unknown = target;
  for (const segment of parseFieldPath(path)) {
    if (!isContainer(current)) {
      return undefined;
    }
    current = readChild(current, segment);
  }
  return current;
}

export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === "string") {
    return value.trim().length === 0;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return false;
}
