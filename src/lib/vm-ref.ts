import type { VmSummary } from "./vm.ts";
import { ambiguousVmReferenceError, vmNotFoundError } from "../errors/index.ts";

export type VmReference = { kind: "id"; id: string } | { kind: "name"; name: string };

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Parse a user-supplied VM reference. UUIDs become id references, anything
 * else is looked up by name, exactly as given. Blank input counts as absent.
 */
export function parseVmReference(input: string | undefined): VmReference | undefined {
  if (input === undefined || input.trim() === "") return undefined;
  return UUID_RE.test(input) ? { kind: "id", id: input } : { kind: "name", name: input };
}

export function formatVmReference(ref: VmReference): string {
  return ref.kind === "id" ? ref.id : ref.name;
}

/**
 * Pick the single VM a name reference denotes. Names are case-sensitive;
 * an exact id match also counts so opaque (non-UUID) ids can be used.
 */
export function matchVmReference(vms: readonly VmSummary[], name: string): VmSummary {
  const matches = vms.filter((vm) => vm.name === name || vm.id === name);
  if (matches.length === 0) {
    throw vmNotFoundError(name);
  }
  if (matches.length > 1) {
    throw ambiguousVmReferenceError(
      name,
      matches.map((vm) => vm.id),
    );
  }
  return matches[0];
}
