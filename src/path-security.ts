import fs from "node:fs/promises";
import path from "node:path";
import { isErrnoException } from "./fs-utils";

/** Requested path resolves outside every configured search root. */
export class PathOutsideRootError extends Error {
  public readonly requestedPath: string;

  public constructor(requestedPath: string) {
    super(`Path outside search roots: ${requestedPath}`);
    this.name = "PathOutsideRootError";
    this.requestedPath = requestedPath;
  }
}

function isWithin(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === "") return true;
  // `..notes.log` is a file inside the root; only a `..` segment escapes it.
  return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/** Realpath when the target exists, else the lexical absolute path. */
async function canonical(p: string): Promise<string> {
  const abs = path.resolve(p);
  try {
    return await fs.realpath(abs);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return abs;
    throw e;
  }
}

/**
 * Confines requests to a fixed set of roots. Symlinks are resolved before the
 * containment check, so a link inside a root that points elsewhere is rejected.
 */
export class PathSandbox {
  private readonly roots: readonly string[];

  private constructor(roots: readonly string[]) {
    this.roots = roots;
  }

  public static async create(roots: readonly string[]): Promise<PathSandbox> {
    if (roots.length === 0) throw new Error("At least one search root is required");
    return new PathSandbox(await Promise.all(roots.map(canonical)));
  }

  public getRoots(): readonly string[] {
    return this.roots;
  }

  /**
   * Canonical absolute path for `requested`. Relative paths are taken against the first
   * root. Throws {@link PathOutsideRootError} on escape.
   */
  public async resolve(requested: string): Promise<string> {
    const abs = path.isAbsolute(requested) ? requested : path.join(this.roots[0], requested);
    const real = await canonical(abs);
    if (!this.roots.some((r) => isWithin(r, real))) throw new PathOutsideRootError(requested);
    return real;
  }

  /** Resolve every path; the first violation rejects the whole batch. */
  public async resolveAll(requested: readonly string[]): Promise<string[]> {
    const out: string[] = [];
    for (const p of requested) out.push(await this.resolve(p));
    return out;
  }
}
