// ─────────────────────────────────────────────────────────────
// Row Schema Compiler — Positional field validators per row type
// ─────────────────────────────────────────────────────────────

import { EnumerationTable, RowSchema } from "../schema/reportSchema";
import { SchemaCompileFailure } from "../schema/errors";
import { ROW_TYPE_PREFIX, isRowTypeName, normalizeRowType } from "../schema/reportFormat";
import type { Diagnostics } from "../diagnostics/reportLogger";
import {
  FieldOptions,
  FieldValidator,
  booleanField,
  dateTimeField,
  decimalField,
  durationField,
  enumField,
  integerField,
  patternField,
  stringField,
} from "../validators/fieldValidators";
import { XsdDocument, XsdElement, childrenByTag, findDescendants, firstChildByTag, splitQName } from "./xsdDocument";

type FieldFactory = (name: string, options: FieldOptions) => FieldValidator;

const PRIMITIVE_FIELDS: ReadonlyMap<string, FieldFactory> = new Map([
  ["xs:string", stringField],
  ["xs:integer", integerField],
  ["xs:decimal", decimalField],
  ["xs:boolean", booleanField],
  ["xs:duration", durationField],
  ["xs:dateTime", dateTimeField],
]);

/**
 * Compile every RecordType declaration of the row document. Each bad row
 * declaration is logged; if there was any, one SchemaCompileFailure follows.
 */
export function compileRowSchema(
  doc: XsdDocument,
  enumerations: EnumerationTable,
  diagnostics: Diagnostics
): RowSchema {
  const simpleTypePatterns = new Map<string, string>();
  for (const simpleType of childrenByTag(doc.root, "simpleType")) {
    const name = simpleType.attributes.name;
    const pattern = patternOf(simpleType);
    if (name && pattern !== undefined) simpleTypePatterns.set(name, pattern);
  }

  const compiler = new RowCompiler(doc, enumerations, simpleTypePatterns);
  const rows = new Map<string, FieldValidator[]>();
  let failures = 0;

  for (const declaration of childrenByTag(doc.root, "complexType")) {
    const name = declaration.attributes.name ?? "";
    if (!isRowTypeName(name)) continue;
    try {
      rows.set(normalizeRowType(name.slice(ROW_TYPE_PREFIX.length)), compiler.fieldsOf(declaration));
    } catch (err: unknown) {
      if (!(err instanceof SchemaCompileFailure)) throw err;
      failures++;
      diagnostics.error(err);
    }
  }

  if (failures > 0) {
    throw new SchemaCompileFailure(doc.fileName, `${failures} row declaration(s) could not be compiled`);
  }

  console.log(`[SCHEMA] ${rows.size} row type(s) compiled from ${doc.fileName}`);
  return rows;
}

/** restriction > pattern value of a simple type, if it has one */
function patternOf(simpleType: XsdElement): string | undefined {
  const restriction = firstChildByTag(simpleType, "restriction");
  const pattern = restriction ? firstChildByTag(restriction, "pattern") : undefined;
  return pattern?.attributes.value;
}

class RowCompiler {
  constructor(
    private readonly doc: XsdDocument,
    private readonly enumerations: EnumerationTable,
    private readonly simpleTypePatterns: ReadonlyMap<string, string>
  ) {}

  fieldsOf(declaration: XsdElement): FieldValidator[] {
    const fields: FieldValidator[] = [];
    for (const sequence of childrenByTag(declaration, "sequence")) {
      for (const element of childrenByTag(sequence, "element")) {
        fields.push(this.fieldOf(element));
      }
    }
    return fields;
  }

  private fieldOf(element: XsdElement): FieldValidator {
    const name = element.attributes.name;
    if (!name) {
      throw new SchemaCompileFailure(this.doc.fileName, "Unexpected element without a name");
    }
    const options = this.optionsOf(element);
    const type = element.attributes.type;

    if (type === undefined) {
      const inline = firstChildByTag(element, "simpleType");
      const pattern = inline ? patternOf(inline) : undefined;
      if (pattern === undefined) {
        const found = findDescendants(element, "restriction")[0]?.children[0]?.tag ?? "content";
        throw new SchemaCompileFailure(this.doc.fileName, `Unexpected complexType ${found} in cell ${name}`);
      }
      return this.pattern(name, pattern, options);
    }

    const primitive = PRIMITIVE_FIELDS.get(type);
    if (primitive) return primitive(name, options);

    const local = splitQName(type).local;
    const pattern = this.simpleTypePatterns.get(local);
    if (pattern !== undefined) return this.pattern(name, pattern, options);

    const allowed = this.enumerations.get(local);
    if (allowed) return enumField(name, local, allowed, options);

    throw new SchemaCompileFailure(
      this.doc.fileName,
      `The cell type ${type} does not exist in the provided configuration files. ` +
        `Please make sure you use the right files and version.`
    );
  }

  private pattern(name: string, source: string, options: FieldOptions): FieldValidator {
    try {
      return patternField(name, source, options);
    } catch (err: unknown) {
      throw new SchemaCompileFailure(
        this.doc.fileName,
        `Invalid pattern "${source}" for cell ${name}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  private optionsOf(element: XsdElement): FieldOptions {
    const minOccurs = element.attributes.minOccurs ?? "1";
    const maxOccurs = element.attributes.maxOccurs ?? "1";
    if (!/^\d+$/.test(minOccurs) || !(maxOccurs === "unbounded" || /^\d+$/.test(maxOccurs))) {
      throw new SchemaCompileFailure(
        this.doc.fileName,
        `Invalid occurrence bounds on cell ${element.attributes.name ?? ""} (minOccurs=${minOccurs}, maxOccurs=${maxOccurs}).`
      );
    }
    return {
      required: Number(minOccurs) >= 1,
      repeated: maxOccurs === "unbounded" || Number(maxOccurs) > 1,
    };
  }
}
