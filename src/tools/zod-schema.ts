/**
 * Zod to JSON Schema conversion for tool listings
 */

import { z } from "zod";

export interface JsonSchemaProperty {
    type?: "string" | "number" | "integer" | "boolean" | "array" | "object";
    description?: string;
    enum?: string[];
    format?: string;
    anyOf?: JsonSchemaProperty[];
    items?: JsonSchemaProperty;
    properties?: Record<string, JsonSchemaProperty>;
    additionalProperties?: JsonSchemaProperty | boolean;
    required?: string[];
    minimum?: number;
    maximum?: number;
}

export interface JsonObjectSchema {
    [key: string]: unknown;
    type: "object";
    properties?: Record<string, JsonSchemaProperty>;
    required?: string[];
}

function withDescription(schema: z.ZodTypeAny, property: JsonSchemaProperty): JsonSchemaProperty {
    return schema.description && !property.description ? { ...property, description: schema.description } : property;
}

/**
 * Strip wrappers that do not change the wire shape. Reports whether the
 * field may be omitted.
 */
function unwrap(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; optional: boolean } {
    if (schema instanceof z.ZodOptional) {
        return { inner: unwrap(schema.unwrap()).inner, optional: true };
    }
    if (schema instanceof z.ZodDefault) {
        return { inner: unwrap(schema.removeDefault()).inner, optional: true };
    }
    if (schema instanceof z.ZodEffects) {
        return unwrap(schema.innerType());
    }
    return { inner: schema, optional: false };
}

export function zodToJsonProperty(schema: z.ZodTypeAny): JsonSchemaProperty {
    const { inner } = unwrap(schema);
    const described = (property: JsonSchemaProperty) => withDescription(schema, withDescription(inner, property));

    if (inner instanceof z.ZodString) {
        return described({ type: "string" });
    }
    if (inner instanceof z.ZodNumber) {
        const property: JsonSchemaProperty = { type: inner.isInt ? "integer" : "number" };
        if (inner.minValue !== null) property.minimum = inner.minValue;
        if (inner.maxValue !== null) property.maximum = inner.maxValue;
        return described(property);
    }
    if (inner instanceof z.ZodBoolean) {
        return described({ type: "boolean" });
    }
    if (inner instanceof z.ZodDate) {
        return described({ type: "string", format: "date-time" });
    }
    if (inner instanceof z.ZodEnum) {
        const options: string[] = inner.options;
        return described({ type: "string", enum: options });
    }
    if (inner instanceof z.ZodLiteral) {
        return described({ type: "string", enum: [String(inner.value)] });
    }
    if (inner instanceof z.ZodArray) {
        return described({ type: "array", items: zodToJsonProperty(inner.element) });
    }
    if (inner instanceof z.ZodRecord) {
        return described({ type: "object", additionalProperties: zodToJsonProperty(inner.valueSchema) });
    }
    if (inner instanceof z.ZodUnion) {
        const options: z.ZodTypeAny[] = inner.options;
        return described({ anyOf: options.map(zodToJsonProperty) });
    }
    if (inner instanceof z.ZodObject) {
        const { properties, required } = objectParts(inner);
        return described({ type: "object", properties, ...(required.length > 0 ? { required } : {}) });
    }
    return described({});
}

function objectParts(schema: z.AnyZodObject): { properties: Record<string, JsonSchemaProperty>; required: string[] } {
    const properties: Record<string, JsonSchemaProperty> = {};
    const required: string[] = [];
    const shape: Record<string, z.ZodTypeAny> = schema.shape;
    for (const [key, field] of Object.entries(shape)) {
        properties[key] = zodToJsonProperty(field);
        if (!unwrap(field).optional) required.push(key);
    }
    return { properties, required };
}

export function zodToJsonSchema(schema: z.AnyZodObject): JsonObjectSchema {
    const { properties, required } = objectParts(schema);
    return {
        type: "object",
        properties,
        ...(required.length > 0 ? { required } : {}),
    };
}
