/**
 * Struct definitions, instances and member dispatch.
 */

import {
  Value,
  FunctionValue,
  StructDefValue,
  InstanceValue,
  typeName,
} from "./value";
import { RuntimeError, typeMismatch, undefinedField } from "./errors";

// ============================================================================
// Definition & Instantiation
// ============================================================================

export function defineStruct(
  name: string,
  fields: Map<string, Value>,
  methods: Map<string, FunctionValue>
): StructDefValue {
  return { tag: "struct", name, fields, methods };
}

/**
 * Create an instance: defaults first, then the explicit field values.
 * Defaults are shared by reference, not copied.
 */
export function instantiate(
  def: Value,
  structName: string,
  inits: [string, Value][]
): InstanceValue | RuntimeError {
  if (def.tag !== "struct") {
    return typeMismatch("Struct", typeName(def), `struct literal '${structName}'`);
  }

  const fields = new Map(def.fields);
  for (const [name, value] of inits) {
    if (!def.fields.has(name)) {
      return undefinedField(`Struct ${def.name}`, name);
    }
    fields.set(name, value);
  }

  return { tag: "instance", def, fields };
}

// ============================================================================
// Member Access
// ============================================================================

/**
 * Resolve `instance.name`: a field, or a method bound to the instance.
 */
export function getMember(instance: InstanceValue, name: string): Value | RuntimeError {
  const field = instance.fields.get(name);
  if (field !== undefined) return field;

  const method = instance.def.methods.get(name);
  if (method !== undefined) return { ...method, self: instance };

  return undefinedField(`Struct ${instance.def.name}`, name);
}

/**
 * Resolve `StructName.name`: a method (unbound) or a field default.
 */
export function getStaticMember(def: StructDefValue, name: string): Value | RuntimeError {
  const method = def.methods.get(name);
  if (method !== undefined) return method;

  const field = def.fields.get(name);
  if (field !== undefined) return field;

  return undefinedField(`Struct ${def.name}`, name);
}

/**
 * Assign a declared field in place. Every alias of the instance observes the
 * change.
 */
export function setField(instance: InstanceValue, name: string, value: Value): RuntimeError | undefined {
  if (!instance.fields.has(name)) {
    return undefinedField(`Struct ${instance.def.name}`, name);
  }
  instance.fields.set(name, value);
  return undefined;
}

// ============================================================================
// Reflection
// ============================================================================

/**
 * Field names of an instance or struct definition, in declaration order.
 */
export function fieldNames(value: Value): string[] | RuntimeError {
  switch (value.tag) {
    case "instance":
      return Array.from(value.def.fields.keys());
    case "struct":
      return Array.from(value.fields.keys());
    default:
      return typeMismatch("struct instance or Struct", typeName(value));
  }
}

export function structName(value: Value): string | RuntimeError {
  switch (value.tag) {
    case "instance":
      return value.def.name;
    case "struct":
      return value.name;
    default:
      return typeMismatch("struct instance or Struct", typeName(value));
  }
}
