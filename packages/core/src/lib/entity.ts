/**
 * Entity labels whose response key is already the plural form
 */
const UNCHANGED_PLURALS = new Set(["entitlements", "preferences"]);

function snakeToCamel(value: string): string {
  return value
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/**
 * Key under which the API wraps an entity in its responses.
 *
 * @example
 * singularEntityName("customers");      // "Customer"
 * singularEntityName("sales_receipt");  // "SalesReceipt"
 * singularEntityName("classes");        // "Class"
 * singularEntityName("preferences");    // "Preferences"
 */
export function singularEntityName(entity: string): string {
  const camel = snakeToCamel(entity.trim());

  if (camel === "Classes") return "Class";
  if (UNCHANGED_PLURALS.has(camel.toLowerCase())) return camel;

  return camel.endsWith("s") ? camel.slice(0, -1) : camel;
}
