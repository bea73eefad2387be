/**
 * Tool name helpers.
 */

/**
 * Convert an agent name into a tool-name-safe snake_case identifier.
 *
 * @example toSnakeCase("Billing Agent") // "billing_agent"
 * @example toSnakeCase("customerSupport") // "customer_support"
 */
export function toSnakeCase(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toLowerCase();
}
