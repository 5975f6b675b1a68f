// ─────────────────────────────────────────────────────────────
// Enumeration Compiler — Allowed value sets from the AVS document
// ─────────────────────────────────────────────────────────────

import { EnumerationTable } from "../schema/reportSchema";
import { SchemaCompileFailure } from "../schema/errors";
import { XsdDocument, childrenByTag, findDescendants, firstChildByTag, splitQName } from "./xsdDocument";

/**
 * Collect the enumeration values of every named simple type. Union types
 * take the values of their member types, resolved until nothing changes.
 */
export function compileEnumerations(doc: XsdDocument): EnumerationTable {
  const table = new Map<string, string[]>();
  const unions = new Map<string, string[]>();

  for (const simpleType of childrenByTag(doc.root, "simpleType")) {
    const name = simpleType.attributes.name;
    if (!name) {
      throw new SchemaCompileFailure(doc.fileName, "simpleType without a name");
    }

    const union = firstChildByTag(simpleType, "union");
    if (union) {
      const members = (union.attributes.memberTypes ?? "")
        .split(/\s+/)
        .filter((member) => member.length > 0)
        .map((member) => splitQName(member).local);
      unions.set(name, members);
      continue;
    }

    const values = findDescendants(simpleType, "enumeration")
      .map((facet) => facet.attributes.value)
      .filter((value): value is string => value !== undefined);
    if (values.length > 0) {
      table.set(name, values);
    }
  }

  // Unions may reference other unions in any order
  let pending = [...unions.entries()];
  while (pending.length > 0) {
    const unresolved: [string, string[]][] = [];
    for (const [name, members] of pending) {
      if (members.every((member) => table.has(member))) {
        table.set(name, members.flatMap((member) => table.get(member) ?? []));
      } else {
        unresolved.push([name, members]);
      }
    }

    if (unresolved.length === pending.length) {
      const detail = unresolved
        .map(([name, members]) => {
          const missing = members.filter((member) => !table.has(member));
          return `${name} (unresolved member types: ${missing.join(", ")})`;
        })
        .join("; ");
      throw new SchemaCompileFailure(doc.fileName, `could not resolve union types: ${detail}`);
    }
    pending = unresolved;
  }

  console.log(`[SCHEMA] ${table.size} enumeration type(s) compiled from ${doc.fileName}`);
  return table;
}
