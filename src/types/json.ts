/** Any value that survives a JSON round trip; the shape of every XIVAPI response body. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
