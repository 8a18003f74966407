/**
 * The values that can appear in a database metadata document or in its
 * user properties. Documents are parsed with the YAML core schema, so
 * there are no dates or other tagged values.
 */
export type PropertyScalar = string | number | boolean | null;

export type PropertyValue = PropertyScalar | PropertyValue[] | PropertyMap;

export interface PropertyMap {
  [key: string]: PropertyValue;
}

function isPropertyScalar(value: unknown): value is PropertyScalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function isPropertyValue(value: unknown): value is PropertyValue {
  if (isPropertyScalar(value)) {
    return true;
  }

  if (Array.isArray(value)) {
    return value.every(isPropertyValue);
  }

  return isPropertyMap(value);
}

export function isPropertyMap(value: unknown): value is PropertyMap {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);
  if (prototype !== Object.prototype && prototype !== null) {
    return false;
  }

  return Object.values(value).every(isPropertyValue);
}

export function hasOwnProperty(map: PropertyMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * Merges new user properties into existing ones. Only the top level is
 * merged: a key in `properties` replaces the whole value stored under the
 * same key in `existing`.
 */
export function mergeProperties(
  existing: PropertyMap,
  properties: PropertyMap,
): PropertyMap {
  return {
    ...existing,
    ...properties,
  };
}
