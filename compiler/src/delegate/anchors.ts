import { type Access, isAnchorClass } from "./provenance.ts";

/** Accesses that can seed a region, in program order. */
export function selectAnchors(accesses: readonly Access[]): Access[] {
  return accesses.filter((access) => isAnchorClass(access.classification));
}
