// ─────────────────────────────────────────────────────────────
// Profile Compiler — Profile content models as grammar trees
// ─────────────────────────────────────────────────────────────

import { GrammarNode, Occurs, RootNode } from "../schema/reportSchema";
import { SchemaCompileFailure } from "../schema/errors";
import {
  NON_PROFILE_NAME_PREFIX,
  ROW_SCHEMA_TYPE_PREFIX,
  ROW_TYPE_PREFIX,
  isRowTypeName,
  normalizeRowType,
} from "../schema/reportFormat";
import type { Diagnostics } from "../diagnostics/reportLogger";
import { XsdDocument, XsdElement, childrenByTag, splitQName } from "./xsdDocument";

const STRUCTURAL_TAGS = new Set(["sequence", "choice", "element"]);

export interface CompiledProfile {
  /** null when the profile is not declared in the document */
  grammar: RootNode | null;
  /** Every profile the document declares */
  profileNames: string[];
}

function isCompositeDeclaration(element: XsdElement): boolean {
  return element.tag === "complexType" && !isRowTypeName(element.attributes.name ?? "");
}

function declarationName(doc: XsdDocument, element: XsdElement): string {
  const name = element.attributes.name;
  if (!name) {
    throw new SchemaCompileFailure(doc.fileName, "Unexpected complexType without a name");
  }
  return name;
}

/**
 * Names of the profiles a row document declares: composite types whose
 * name ends in "Profile", grouping declarations excluded.
 */
export function listProfiles(doc: XsdDocument): string[] {
  return childrenByTag(doc.root, "complexType")
    .filter(isCompositeDeclaration)
    .map((element) => declarationName(doc, element))
    .filter((name) => name.toLowerCase().endsWith("profile") && !name.startsWith(NON_PROFILE_NAME_PREFIX));
}

/**
 * Compile the content model of `<profileName>Block` into a grammar tree.
 * A profile the document does not declare is reported to `diagnostics`
 * and yields a null grammar.
 */
export function compileProfile(
  doc: XsdDocument,
  profileName: string,
  diagnostics: Diagnostics
): CompiledProfile {
  const blockName = `${profileName}block`.toLowerCase();
  const composites = new Map<string, XsdElement>();
  let blockDeclaration: XsdElement | undefined;

  // Pass one: composites may be referenced before they are declared
  for (const element of doc.root.children) {
    if (!isCompositeDeclaration(element)) continue;
    const name = declarationName(doc, element);
    if (name.toLowerCase() === blockName) blockDeclaration = element;
    else composites.set(name, element);
  }

  const profileNames = listProfiles(doc);

  if (!blockDeclaration) {
    diagnostics.warning(
      `The profile you entered ${profileName} does not exist in the dsrf xsd file: ${doc.fileName}. ` +
        `Valid profiles: [${profileNames.join(", ")}]`
    );
    return { grammar: null, profileNames };
  }

  const builder = new GrammarBuilder(doc, composites);
  const children = structuralChildren(blockDeclaration).map((child) => builder.build(child));
  if (children.length === 0) {
    throw new SchemaCompileFailure(doc.fileName, `profile block ${profileName}Block has no content model`);
  }

  const child: GrammarNode =
    children.length === 1 ? children[0] : { kind: "sequence", children, minOccurs: 1, maxOccurs: 1 };

  console.log(`[SCHEMA] Profile ${profileName} compiled from ${doc.fileName}`);
  return { grammar: { kind: "root", child }, profileNames };
}

// ── Grammar construction ─────────────────────────────────

function structuralChildren(element: XsdElement): XsdElement[] {
  return element.children.filter((child) => STRUCTURAL_TAGS.has(child.tag));
}

class GrammarBuilder {
  private readonly expanding: string[] = [];

  constructor(
    private readonly doc: XsdDocument,
    private readonly composites: ReadonlyMap<string, XsdElement>
  ) {}

  build(element: XsdElement): GrammarNode {
    const occurs = this.occursOf(element);
    const elementName = element.attributes.name ?? "";
    const typeRef = element.attributes.type ?? "";

    if (typeRef) {
      const { prefix, local } = splitQName(typeRef);
      if (prefix !== ROW_SCHEMA_TYPE_PREFIX) {
        throw new SchemaCompileFailure(
          this.doc.fileName,
          `The element "${elementName}" with type "${typeRef}" does not have the "${ROW_SCHEMA_TYPE_PREFIX}:" prefix. ` +
            `This is likely caused by the type of the parent element not being recognized as a valid row type. ` +
            `Please ensure that all row types in the XSD start with the prefix "${ROW_TYPE_PREFIX}".`
        );
      }

      if (isRowTypeName(local)) {
        return { kind: "leaf", rowType: normalizeRowType(local.slice(ROW_TYPE_PREFIX.length)), ...occurs };
      }

      const composite = this.composites.get(local);
      if (!composite) {
        throw new SchemaCompileFailure(
          this.doc.fileName,
          `The element "${elementName}" with type "${local}" does not exist in the dsrf xsd file "${this.doc.fileName}".`
        );
      }
      if (this.expanding.includes(local)) {
        throw new SchemaCompileFailure(
          this.doc.fileName,
          `Composite type "${local}" references itself (${[...this.expanding, local].join(" -> ")}).`
        );
      }

      this.expanding.push(local);
      const children = structuralChildren(composite).map((child) => this.build(child));
      this.expanding.pop();
      return { kind: "sequence", children, ...occurs };
    }

    const children = structuralChildren(element).map((child) => this.build(child));
    if (element.tag === "choice") return { kind: "choice", children, ...occurs };
    if (element.tag === "sequence") return { kind: "sequence", children, ...occurs };

    if (children.length === 0) {
      throw new SchemaCompileFailure(
        this.doc.fileName,
        `The element "${elementName}" declares neither a type nor a content model.`
      );
    }
    return { kind: "sequence", children, ...occurs };
  }

  private occursOf(element: XsdElement): Occurs {
    return {
      minOccurs: this.parseOccurs("minOccurs", element.attributes.minOccurs ?? "1"),
      maxOccurs:
        element.attributes.maxOccurs === "unbounded"
          ? Infinity
          : this.parseOccurs("maxOccurs", element.attributes.maxOccurs ?? "1"),
    };
  }

  private parseOccurs(attribute: string, value: string): number {
    if (!/^\s*\d+\s*$/.test(value)) {
      throw new SchemaCompileFailure(
        this.doc.fileName,
        `The value "${value}" is invalid as a ${attribute}. Expected an integer/"unbounded".`
      );
    }
    return Number(value);
  }
}
