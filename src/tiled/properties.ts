import { parseColor } from "./color.js";
import { MapParseError } from "./errors.js";
import type { JsonValue, Properties, PropertyValue } from "./model.js";
import type { RawProperty } from "./rawSchema.js";

const INT_STRING = /^[+-]?\d+$/;

function isJsonValue(v: unknown): v is JsonValue {
  if (v === null) return true;
  if (typeof v === "boolean" || typeof v === "string") return true;
  if (typeof v === "number") return Number.isFinite(v);
  if (Array.isArray(v)) return v.every((x: unknown) => isJsonValue(x));
  if (typeof v === "object") return Object.values(v).every((x: unknown) => isJsonValue(x));
  return false;
}

function isJsonObject(v: unknown): v is Readonly<Record<string, JsonValue>> {
  return typeof v === "object" && v !== null && !Array.isArray(v) && isJsonValue(v);
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;
const UINT32_MAX = 0xffffffff;

function toInteger(v: unknown, min: number, max: number): number | null {
  let n: number;
  if (typeof v === "number") n = v;
  else if (typeof v === "string" && INT_STRING.test(v.trim())) n = Number(v.trim());
  else return null;
  return Number.isInteger(n) && n >= min && n <= max ? n : null;
}

function toFloat(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function toBool(v: unknown): boolean | null {
  if (typeof v === "boolean") return v;
  if (v === "true") return true;
  if (v === "false") return false;
  return null;
}

/**
 * Converts one name/type/value triple. The declared type tag decides which
 * conversion is attempted; a missing tag means "string".
 */
export function resolveProperty(p: RawProperty, path: string): PropertyValue {
  const type = p.type ?? "string";
  const v = p.value;

  const fail = (expected: string): MapParseError =>
    new MapParseError(
      "InvalidProperty",
      `property '${p.name}' of type '${type}' has invalid value ${JSON.stringify(v) ?? String(v)} (expected ${expected})`,
      { path },
    );

  switch (type) {
    case "string":
      if (typeof v !== "string") throw fail("string");
      return { type: "string", value: v };

    case "file":
      if (typeof v !== "string") throw fail("file path string");
      return { type: "file", value: v };

    case "int": {
      const n = toInteger(v, INT32_MIN, INT32_MAX);
      if (n === null) throw fail("32-bit integer");
      return { type: "int", value: n };
    }

    case "float": {
      const n = toFloat(v);
      if (n === null) throw fail("number");
      return { type: "float", value: n };
    }

    case "bool": {
      const b = toBool(v);
      if (b === null) throw fail("boolean");
      return { type: "bool", value: b };
    }

    case "color": {
      const c = typeof v === "string" ? parseColor(v) : null;
      if (!c) throw fail("#RRGGBB or #AARRGGBB");
      return { type: "color", value: c };
    }

    case "object": {
      const n = toInteger(v, 0, UINT32_MAX);
      if (n === null) throw fail("object id");
      return { type: "object", value: n };
    }

    case "class":
      if (!isJsonObject(v)) throw fail("object of member values");
      return p.propertytype === undefined
        ? { type: "class", value: v }
        : { type: "class", propertyType: p.propertytype, value: v };

    default:
      throw new MapParseError(
        "InvalidProperty",
        `property '${p.name}' has unknown type '${type}'`,
        { path },
      );
  }
}

/** Name → value. A later entry with the same name replaces an earlier one. */
export function resolveProperties(
  raw: ReadonlyArray<RawProperty> | undefined,
  path: string,
): Properties {
  const byName = new Map<string, PropertyValue>();
  if (!raw) return {};

  raw.forEach((p, i) => {
    byName.set(p.name, resolveProperty(p, `${path}[${i}]`));
  });

  return Object.fromEntries(byName);
}
