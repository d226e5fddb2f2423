import type { DirectoryAttributes, DirectorySearchHit } from "../types/directory.js";

// RFC 2849: values that are not SAFE-STRINGs must be base64-encoded ("attr:: ...").
const SAFE_STRING = /^[\x01-\x09\x0b-\x0c\x0e-\x1f\x21-\x39\x3b\x3d-\x7f][\x01-\x09\x0b-\x0c\x0e-\x7f]*$/;

function renderLine(attribute: string, value: string): string {
  if (value === "" || SAFE_STRING.test(value)) return `${attribute}: ${value}`;
  return `${attribute}:: ${Buffer.from(value, "utf8").toString("base64")}`;
}

function valuesOf(value: string | readonly string[]): readonly string[] {
  return typeof value === "string" ? [value] : value;
}

/** LDIF content record for ldapadd. */
export function renderAddRecord(dn: string, attributes: DirectoryAttributes): string {
  const lines = [renderLine("dn", dn)];
  for (const [attribute, value] of Object.entries(attributes)) {
    for (const v of valuesOf(value)) lines.push(renderLine(attribute, v));
  }
  return `${lines.join("\n")}\n`;
}

/** LDIF change record adding values to one attribute, for ldapmodify. */
export function renderAddValuesRecord(dn: string, attribute: string, values: readonly string[]): string {
  const lines = [renderLine("dn", dn), "changetype: modify", `add: ${attribute}`];
  for (const v of values) lines.push(renderLine(attribute, v));
  lines.push("-");
  return `${lines.join("\n")}\n`;
}

/**
 * Parse ldapsearch -LLL output. Handles folded lines (continuation lines start
 * with one space), base64 values and comment lines.
 */
export function parseLdif(output: string): DirectorySearchHit[] {
  const hits: DirectorySearchHit[] = [];
  const unfolded: string[] = [];
  for (const raw of output.split(/\r?\n/)) {
    if (raw.startsWith(" ") && unfolded.length > 0 && unfolded[unfolded.length - 1] !== "") {
      unfolded[unfolded.length - 1] += raw.slice(1);
    } else {
      unfolded.push(raw);
    }
  }

  let current: { dn: string; attributes: Record<string, string[]> } | null = null;
  for (const line of unfolded) {
    if (line === "") {
      if (current) hits.push(current);
      current = null;
      continue;
    }
    if (line.startsWith("#")) continue;

    const match = line.match(/^([A-Za-z0-9;.-]+)(::?)\s?(.*)$/);
    if (!match) continue;
    const [, attribute = "", separator, rawValue = ""] = match;
    const value = separator === "::" ? Buffer.from(rawValue, "base64").toString("utf8") : rawValue;

    if (attribute.toLowerCase() === "dn") {
      if (current) hits.push(current);
      current = { dn: value, attributes: {} };
      continue;
    }
    if (!current) continue;
    const list = current.attributes[attribute] ?? [];
    list.push(value);
    current.attributes[attribute] = list;
  }
  if (current) hits.push(current);
  return hits;
}
