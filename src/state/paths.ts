import { isAbsolute, relative, resolve } from "node:path";

/**
 * Check one caller-supplied name (run id, artifact name, request id, job
 * name) before it becomes a file or directory name.
 */
export function sanitizePathComponent(component: string): string {
  const name = component.trim();
  if (name.length === 0) throw new Error("Path component cannot be empty");
  if (name === "." || /\.\.|[/\\\0]/.test(name)) {
    throw new Error(`Invalid path component: ${component}`);
  }
  return name;
}

/** Join checked names under `base`; the result never leaves `base`. */
export function safePath(base: string, ...components: string[]): string {
  if (!isAbsolute(base)) throw new Error(`Base path must be absolute: ${base}`);

  const root = resolve(base);
  const full = resolve(root, ...components.map(sanitizePathComponent));
  const rel = relative(root, full);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new Error(`Path escapes ${root}: ${full}`);
  }
  return full;
}

/** `<dir>/<id>.json` for a record keyed by `id`. */
export function recordFile(dir: string, id: string): string {
  return safePath(dir, `${sanitizePathComponent(id)}.json`);
}
