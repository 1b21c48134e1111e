/**
 * JSON Schema Sanitizer for upstream tool definitions
 *
 * The upstream validates MCP tool input schemas strictly: every property needs a
 * type and a description, `required` may only name existing properties, and
 * several JSON Schema features are rejected outright. This sanitizer infers
 * missing `required` lists, removes or converts unsupported constraints to
 * description hints, and reports schemas it cannot repair so the caller can
 * drop that tool.
 */

import { logger } from "../../../shared/logger.js";

export const JSON_SCHEMA_DRAFT = "http://json-schema.org/draft-07/schema#";

// Unsupported constraint keywords that should be moved to description hints
const UNSUPPORTED_CONSTRAINTS = [
    "minLength",
    "maxLength",
    "minimum",
    "maximum",
    "exclusiveMinimum",
    "exclusiveMaximum",
    "pattern",
    "minItems",
    "maxItems",
    "minProperties",
    "maxProperties",
    "format",
    "default",
    "examples",
] as const;

// Keywords that should be removed entirely
const UNSUPPORTED_KEYWORDS = new Set<string>([
    ...UNSUPPORTED_CONSTRAINTS,
    "$schema",
    "$defs",
    "definitions",
    "const",
    "$ref",
    "additionalProperties",
    "propertyNames",
    "title",
    "$id",
    "$comment",
    "nullable",
]);

const VALID_TYPES = new Set(["string", "number", "integer", "boolean", "array", "object", "null"]);

// Property names whose value is conventionally an object
const OBJECT_PROPERTY_NAMES = new Set(["headers", "options", "params", "payload", "data"]);

type SchemaObject = Record<string, unknown>;

export class SchemaError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "SchemaError";
    }
}

export interface ToolDefinition {
    name: string;
    description?: string;
    parameters?: unknown;
}

export interface SanitizedTool {
    name: string;
    description: string;
    input_schema: SchemaObject;
}

export interface DroppedTool {
    name: string;
    reason: string;
}

export interface SanitizeToolsResult {
    tools: SanitizedTool[];
    dropped: DroppedTool[];
}

/**
 * Check if value is a plain object
 */
function isPlainObject(value: unknown): value is SchemaObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep clone a JSON value
 */
function deepClone(value: unknown): unknown {
    if (Array.isArray(value)) return value.map((item) => deepClone(item));
    if (!isPlainObject(value)) return value;
    const cloned: SchemaObject = {};
    for (const [key, child] of Object.entries(value)) {
        cloned[key] = deepClone(child);
    }
    return cloned;
}

/**
 * Drop null, empty strings, empty arrays and empty objects (except property schemas)
 */
function deepClean(value: unknown, propertyMap = false): unknown {
    if (Array.isArray(value)) {
        return value
            .map((item) => deepClean(item))
            .filter((item) => !isEmptyValue(item));
    }
    if (isPlainObject(value)) {
        const result: SchemaObject = {};
        for (const [key, child] of Object.entries(value)) {
            const cleaned = deepClean(child, !propertyMap && key === "properties");
            // Property names are kept even when their schema is empty
            if (!propertyMap && key !== "properties" && isEmptyValue(cleaned)) continue;
            result[key] = cleaned ?? {};
        }
        return result;
    }
    return typeof value === "string" ? value.trim() : value;
}

function isEmptyValue(value: unknown): boolean {
    if (value === null || value === undefined) return true;
    if (typeof value === "string") return value.trim() === "";
    if (Array.isArray(value)) return value.length === 0;
    if (isPlainObject(value)) return Object.keys(value).length === 0;
    return false;
}

/**
 * Appends a hint to a schema's description field.
 */
function appendDescriptionHint(schema: SchemaObject, hint: string): SchemaObject {
    const existing = typeof schema.description === "string" ? schema.description : "";
    const newDescription = existing ? `${existing} (${hint})` : hint;
    return { ...schema, description: newDescription };
}

// ============================================
// Validation
// ============================================

function validateSchema(schema: unknown, path: string): void {
    if (typeof schema === "boolean") return;
    if (!isPlainObject(schema)) {
        throw new SchemaError(`${path} is not a schema object`);
    }

    const type = schema.type;
    if (type !== undefined) {
        const types: unknown[] = Array.isArray(type) ? type : [type];
        const valid = types.length > 0 && types.every((t) => typeof t === "string" && VALID_TYPES.has(t));
        if (!valid) {
            throw new SchemaError(`${path} has unparseable type ${JSON.stringify(type)}`);
        }
    }

    if (schema.properties !== undefined) {
        if (!isPlainObject(schema.properties)) {
            throw new SchemaError(`${path}.properties is not an object`);
        }
        for (const [name, property] of Object.entries(schema.properties)) {
            validateSchema(property, `${path}.properties.${name}`);
        }
    }

    if (schema.items !== undefined && !Array.isArray(schema.items)) {
        validateSchema(schema.items, `${path}.items`);
    }

    if (schema.required !== undefined) {
        const required = schema.required;
        if (!Array.isArray(required) || !required.every((r) => typeof r === "string")) {
            throw new SchemaError(`${path}.required is not a list of property names`);
        }
    }

    for (const key of ["anyOf", "oneOf", "allOf"] as const) {
        const variants = schema[key];
        if (variants === undefined) continue;
        if (!Array.isArray(variants)) {
            throw new SchemaError(`${path}.${key} is not an array`);
        }
        variants.forEach((variant, i) => validateSchema(variant, `${path}.${key}[${i}]`));
    }
}

// ============================================
// Required Inference
// ============================================

function isOptionalProperty(property: unknown): boolean {
    if (!isPlainObject(property)) return false;
    if ("default" in property || property.nullable === true) return true;
    return Array.isArray(property.type) && property.type.includes("null");
}

/**
 * Fill in `required` where absent: every property with no default that is not nullable
 */
export function inferRequired(schema: SchemaObject): SchemaObject {
    const result = { ...schema };

    if (isPlainObject(result.properties)) {
        const properties: SchemaObject = {};
        for (const [name, property] of Object.entries(result.properties)) {
            properties[name] = isPlainObject(property) ? inferRequired(property) : property;
        }
        result.properties = properties;

        if (result.required === undefined) {
            result.required = Object.entries(properties)
                .filter(([, property]) => !isOptionalProperty(property))
                .map(([name]) => name);
        }
    }

    if (isPlainObject(result.items)) {
        result.items = inferRequired(result.items);
    }

    return result;
}

// ============================================
// Cleaning
// ============================================

/**
 * Convert const to enum
 * { const: "value" } → { enum: ["value"] }
 */
function convertConstToEnum(schema: SchemaObject): SchemaObject {
    const result = { ...schema };
    if ("const" in result && !("enum" in result)) {
        result.enum = [result.const];
        delete result.const;
    }
    return result;
}

/**
 * Flatten type arrays
 * { type: ["string", "null"] } → { type: "string" } + description hint
 */
function flattenTypeArrays(schema: SchemaObject): SchemaObject {
    let result = { ...schema };

    if (Array.isArray(result.type)) {
        const types = result.type.filter((t): t is string => typeof t === "string");
        const nonNullTypes = types.filter((t) => t !== "null");
        const hasNull = types.includes("null");

        if (nonNullTypes.length > 0) {
            result.type = nonNullTypes[0];
            if (hasNull) {
                result = appendDescriptionHint(result, "nullable");
            }
            if (nonNullTypes.length > 1) {
                result = appendDescriptionHint(result, `types: ${types.join(", ")}`);
            }
        } else {
            result.type = "string";
            result = appendDescriptionHint(result, "nullable");
        }
    } else if (result.nullable === true) {
        result = appendDescriptionHint(result, "nullable");
    }

    return result;
}

/**
 * Merge allOf schemas
 * { allOf: [A, B, C] } → merge all properties
 */
function mergeAllOf(schema: SchemaObject): SchemaObject {
    const result = { ...schema };
    const allOf = result.allOf;
    if (!Array.isArray(allOf)) {
        return result;
    }

    delete result.allOf;
    const properties: SchemaObject = isPlainObject(result.properties) ? { ...result.properties } : {};
    const required = new Set<string>(
        Array.isArray(result.required) ? result.required.filter((r): r is string => typeof r === "string") : []
    );

    for (const subSchema of allOf) {
        if (!isPlainObject(subSchema)) continue;

        if (isPlainObject(subSchema.properties)) {
            Object.assign(properties, deepClone(subSchema.properties));
        }
        if (Array.isArray(subSchema.required)) {
            for (const name of subSchema.required) {
                if (typeof name === "string") required.add(name);
            }
        }
        // Merge other fields without overwriting the parent's
        for (const [key, value] of Object.entries(subSchema)) {
            if (key !== "properties" && key !== "required" && result[key] === undefined) {
                result[key] = deepClone(value);
            }
        }
    }

    if (Object.keys(properties).length > 0) {
        result.properties = properties;
    }
    if (required.size > 0) {
        result.required = [...required];
    }
    return result;
}

/**
 * Flatten anyOf/oneOf by selecting the most complex schema
 * { anyOf: [A, B, C] } → select schema with most keys
 */
function flattenAnyOfOneOf(schema: SchemaObject): SchemaObject {
    let result = { ...schema };

    for (const key of ["anyOf", "oneOf"] as const) {
        const variants = result[key];
        if (!Array.isArray(variants)) continue;

        let selected: SchemaObject = {};
        let maxComplexity = -1;
        for (const subSchema of variants) {
            if (isPlainObject(subSchema) && subSchema.type !== "null") {
                const complexity = Object.keys(subSchema).length;
                if (complexity > maxComplexity) {
                    maxComplexity = complexity;
                    selected = subSchema;
                }
            }
        }

        delete result[key];
        if (Object.keys(selected).length > 0) {
            result = { ...selected, ...result };
            result = appendDescriptionHint(result, `${key} flattened`);
        }
    }

    return result;
}

/**
 * Moves unsupported constraints to description hints.
 * { minLength: 1, maxLength: 100 } → adds "(minLength: 1, maxLength: 100)" to description
 */
function moveConstraintsToDescription(schema: SchemaObject): SchemaObject {
    const hints: string[] = [];
    for (const constraint of UNSUPPORTED_CONSTRAINTS) {
        const value = schema[constraint];
        if (value === undefined) continue;
        hints.push(`${constraint}: ${typeof value === "object" ? JSON.stringify(value) : String(value)}`);
    }

    return hints.length > 0 ? appendDescriptionHint(schema, hints.join(", ")) : schema;
}

/**
 * Removes unsupported keywords from one schema node.
 */
function removeUnsupportedKeywords(schema: SchemaObject): SchemaObject {
    const result: SchemaObject = {};
    for (const [key, value] of Object.entries(schema)) {
        if (!UNSUPPORTED_KEYWORDS.has(key)) {
            result[key] = value;
        }
    }
    return result;
}

/**
 * Main schema cleaning function, applied recursively through properties and items
 */
export function cleanJSONSchema(schema: unknown): unknown {
    if (!isPlainObject(schema)) {
        return schema;
    }

    const cloned = deepClone(schema);
    if (!isPlainObject(cloned)) {
        return cloned;
    }
    let result: SchemaObject = cloned;

    // Phase 1: Convert and add hints
    result = convertConstToEnum(result);
    result = flattenTypeArrays(result);

    // Phase 2: Flatten complex structures
    result = mergeAllOf(result);
    result = flattenAnyOfOneOf(result);

    // Phase 3: Move constraints to description
    result = moveConstraintsToDescription(result);

    // Phase 4: Cleanup
    result = removeUnsupportedKeywords(result);

    if (isPlainObject(result.properties)) {
        const cleanedProps: SchemaObject = {};
        for (const [key, value] of Object.entries(result.properties)) {
            cleanedProps[key] = cleanJSONSchema(isPlainObject(value) ? value : {});
        }
        result.properties = cleanedProps;
    }

    if (result.items !== undefined) {
        result.items = Array.isArray(result.items)
            ? result.items.map((item) => cleanJSONSchema(item))
            : cleanJSONSchema(result.items);
    }

    return result;
}

// ============================================
// Property Repair
// ============================================

function inferTypeForProperty(name: string): string {
    return OBJECT_PROPERTY_NAMES.has(name.toLowerCase()) ? "object" : "string";
}

function hasText(value: unknown): value is string {
    return typeof value === "string" && value.trim() !== "";
}

function filterRequired(schema: SchemaObject, properties: SchemaObject): SchemaObject {
    const result = { ...schema };
    const required = Array.isArray(result.required)
        ? result.required.filter((name): name is string => typeof name === "string" && name in properties)
        : [];
    if (required.length > 0) {
        result.required = required;
    } else {
        delete result.required;
    }
    return result;
}

/**
 * Ensure a top-level property carries a type and a description.
 * `headers` must be an object with at least one property.
 */
function ensurePropertySchema(name: string, schema: unknown): SchemaObject {
    let property: SchemaObject = isPlainObject(schema) ? { ...schema } : {};

    if (!hasText(property.type)) {
        property.type = inferTypeForProperty(name);
    }
    if (!hasText(property.description)) {
        property.description = `${name} parameter`;
    }

    if (name.toLowerCase() === "headers") {
        property.type = "object";
        const headers: SchemaObject = {};
        if (isPlainObject(property.properties)) {
            for (const [header, value] of Object.entries(property.properties)) {
                const sub: SchemaObject = isPlainObject(value) ? { ...value } : {};
                if (!hasText(sub.type)) sub.type = "string";
                if (!hasText(sub.description)) sub.description = `${header} header`;
                headers[header] = sub;
            }
        }
        if (Object.keys(headers).length === 0) {
            headers["user-agent"] = { type: "string", description: "User-Agent header for the request" };
        }
        property.properties = headers;
        property = filterRequired(property, headers);
    }

    return property;
}

/**
 * Normalize one tool's parameter schema into the upstream's input_schema shape.
 * Throws SchemaError when the schema cannot be repaired.
 */
export function sanitizeToolSchema(parameters: unknown): SchemaObject {
    if (parameters === undefined || parameters === null) {
        return { type: "object", properties: {}, $schema: JSON_SCHEMA_DRAFT };
    }

    validateSchema(parameters, "parameters");
    if (!isPlainObject(parameters)) {
        throw new SchemaError("parameters is not a schema object");
    }

    const type = parameters.type ?? "object";
    if (type !== "object") {
        throw new SchemaError(`parameters must describe an object, got ${JSON.stringify(type)}`);
    }

    const withRequired = inferRequired(parameters);
    const cleaned = deepClean(cleanJSONSchema(withRequired));
    let result: SchemaObject = isPlainObject(cleaned) ? cleaned : {};

    result.type = "object";
    const properties: SchemaObject = {};
    if (isPlainObject(result.properties)) {
        for (const [name, property] of Object.entries(result.properties)) {
            properties[name] = ensurePropertySchema(name, property);
        }
    }
    result.properties = properties;
    result = filterRequired(result, properties);
    result.$schema = JSON_SCHEMA_DRAFT;

    return result;
}

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

/**
 * Sanitize a list of tool definitions, dropping those that cannot be repaired
 */
export function sanitizeTools(tools: ToolDefinition[]): SanitizeToolsResult {
    const result: SanitizeToolsResult = { tools: [], dropped: [] };
    const seen = new Set<string>();

    for (const tool of tools) {
        const name = tool.name.trim();
        try {
            if (!TOOL_NAME_PATTERN.test(name)) {
                throw new SchemaError(`invalid tool name ${JSON.stringify(tool.name)}`);
            }
            if (seen.has(name)) {
                throw new SchemaError(`duplicate tool name ${name}`);
            }

            result.tools.push({
                name,
                description: tool.description?.trim() ?? "",
                input_schema: sanitizeToolSchema(tool.parameters),
            });
            seen.add(name);
        } catch (error) {
            if (!(error instanceof SchemaError)) {
                throw error;
            }
            logger.warn(`Dropping tool "${tool.name}": ${error.message}`);
            result.dropped.push({ name: tool.name, reason: error.message });
        }
    }

    return result;
}
