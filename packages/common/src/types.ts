export type Class<T = object> = new (...args: never[]) => T;

export type MaybePromise<T> = T | Promise<T>;

export type JsonPrimitive = string | number | boolean | null;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
