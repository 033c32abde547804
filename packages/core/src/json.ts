/** basic json primitive values */
export type JsonPrimitive = string | number | boolean | null;

/** json object with string keys */
export type JsonObject = { [key: string]: JsonValue };

/** any valid json value */
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];

/** json value that may still carry undefined fields, dropped on serialization */
export type JsonifibleValue =
  | JsonPrimitive
  | JsonifibleObject
  | JsonifibleValue[]
  | undefined;

/** object whose values serialize to json */
export type JsonifibleObject = { [key: string]: JsonifibleValue };
