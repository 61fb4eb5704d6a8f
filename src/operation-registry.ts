import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { DuplicateOperationError, errorMessage, isAppError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  HandlerResult,
  InputSchema,
  JsonObject,
  Operation,
  ToolDescriptor,
} from "./types.js";
import { isJsonObject, toJsonValue } from "./json.js";

/**
 * Object descriptor advertised for an operation. Each property is rendered
 * with zod-to-json-schema; a property is required unless its zod type
 * accepts `undefined` (optional or defaulted).
 */
export function describeInput(schema: z.AnyZodObject): InputSchema {
  const properties: JsonObject = {};
  const required: string[] = [];
  const shape: z.ZodRawShape = schema.shape;

  for (const [key, field] of Object.entries(shape)) {
    const rendered = toJsonValue(
      zodToJsonSchema(field, { $refStrategy: "none" })
    );
    if (isJsonObject(rendered)) {
      delete rendered.$schema;
      properties[key] = rendered;
    } else {
      properties[key] = {};
    }
    if (!field.isOptional()) {
      required.push(key);
    }
  }

  return { type: "object", properties, required };
}

export class OperationRegistry {
  private readonly operations = new Map<string, Operation>();

  register(operation: Operation): this {
    if (this.operations.has(operation.name)) {
      throw new DuplicateOperationError(operation.name);
    }
    this.operations.set(operation.name, Object.freeze({ ...operation }));
    return this;
  }

  get(name: string): Operation | undefined {
    return this.operations.get(name);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  /** Operations in registration order. */
  list(): Operation[] {
    return Array.from(this.operations.values());
  }

  names(): string[] {
    return Array.from(this.operations.keys());
  }

  /**
   * Run an operation. Returns `undefined` for unknown names. Thrown
   * `AppError`s keep their kind; anything else becomes an `internal` failure.
   */
  async invoke(name: string, args: unknown): Promise<HandlerResult | undefined> {
    const operation = this.operations.get(name);
    if (!operation) {
      return undefined;
    }

    try {
      return await operation.handler(args);
    } catch (error) {
      if (isAppError(error)) {
        return {
          ok: false,
          kind: error.kind,
          message: error.message,
          details: error.details,
        };
      }

      logger.error(`Error in ${name} operation`, {
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return {
        ok: false,
        kind: "internal",
        message: `Error executing ${name}: ${errorMessage(error)}`,
      };
    }
  }

  describe(): ToolDescriptor[] {
    return this.list().map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }
}
