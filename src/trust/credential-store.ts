/**
 * Secret storage collaborator.
 *
 * Production deployments back this with a hardware keystore; the kernel
 * only needs store/retrieve/delete by name.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { resolve, sep } from "node:path";

export interface CredentialStore {
  store(name: string, secret: Buffer): Promise<void>;
  retrieve(name: string): Promise<Buffer | undefined>;
  delete(name: string): Promise<boolean>;
}

const NAME_RE = /^[a-z0-9][a-z0-9._-]{0,127}$/i;

function assertName(name: string): void {
  if (!NAME_RE.test(name)) {
    throw new Error(`Invalid credential name: ${name}`);
  }
}

export class MemoryCredentialStore implements CredentialStore {
  private readonly secrets = new Map<string, Buffer>();

  async store(name: string, secret: Buffer): Promise<void> {
    assertName(name);
    this.secrets.set(name, Buffer.from(secret));
  }

  async retrieve(name: string): Promise<Buffer | undefined> {
    const v = this.secrets.get(name);
    return v ? Buffer.from(v) : undefined;
  }

  async delete(name: string): Promise<boolean> {
    return this.secrets.delete(name);
  }
}

/**
 * One file per secret, mode 0600, under a private directory. Used by the
 * CLI when no platform keystore is wired in.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  private pathFor(name: string): string {
    assertName(name);
    const p = resolve(this.root, name);
    if (!p.startsWith(this.root + sep)) {
      throw new Error(`Path traversal detected: ${name}`);
    }
    return p;
  }

  async store(name: string, secret: Buffer): Promise<void> {
    const p = this.pathFor(name);
    mkdirSync(this.root, { recursive: true, mode: 0o700 });
    writeFileSync(p, secret, { mode: 0o600 });
  }

  async retrieve(name: string): Promise<Buffer | undefined> {
    const p = this.pathFor(name);
    return existsSync(p) ? readFileSync(p) : undefined;
  }

  async delete(name: string): Promise<boolean> {
    const p = this.pathFor(name);
    if (!existsSync(p)) return false;
    rmSync(p);
    return true;
  }

  get directory(): string {
    return this.root;
  }
}
