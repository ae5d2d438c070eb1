/** basic json primitive values */
export type JsonPrimitive = string | number | boolean | null;

/** json object with string keys */
export type JsonObject = { [key: string]: JsonValue };
/** json array containing any json values */
export type JsonArray = JsonValue[];
/** any valid json value */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/** any jsonifible valid json value including undefined */
export type JsonifibleValue =
  | JsonPrimitive
  | JsonifibleObject
  | JsonObject
  | JsonArray
  | Array<JsonPrimitive | JsonifibleObject>
  | undefined;

/** jsonifible object with string keys */
export type JsonifibleObject = { [key: string]: JsonifibleValue };

/**
 * checks whether a parsed json value is a plain object
 * @param value value produced by JSON.parse
 * @returns true when the value is a non-array object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * parses a json document, returning undefined instead of throwing
 * @param text raw json text
 * @returns the parsed value or undefined when the text is not json
 */
export function parseJson(text: string): JsonValue | undefined {
  try {
    const parsed: JsonValue = JSON.parse(text);

    return parsed;
  } catch {
    return undefined;
  }
}
