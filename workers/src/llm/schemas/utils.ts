import { z } from "zod";
import prettier from "@prettier/sync";

/**
 * Convert a Zod schema to a TypeScript type alias string with JSDoc comments.
 * Used for system prompts.
 */
export function zodToTs(schema: z.ZodTypeAny, name: string): string {
  const description = schema.description
    ? `/** ${schema.description} */\n`
    : "";
  return prettier.format(`${description}type ${name} = ${printNode(schema)};`, {
    parser: "typescript",
  });
}

function unwrap(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; nullable: boolean } {
  let inner = schema;
  let nullable = false;
  while (inner instanceof z.ZodOptional || inner instanceof z.ZodNullable) {
    if (inner instanceof z.ZodNullable) nullable = true;
    inner = inner.unwrap();
  }
  return { inner, nullable };
}

function printNode(schema: z.ZodTypeAny, indent = 0): string {
  const pad = "  ".repeat(indent);
  const { inner, nullable } = unwrap(schema);
  const printed = printInner(inner, indent, pad);
  return nullable ? `${printed} | null` : printed;
}

function printInner(inner: z.ZodTypeAny, indent: number, pad: string): string {
  if (inner instanceof z.ZodString) {
    return "string";
  }
  if (inner instanceof z.ZodNumber) {
    return "number";
  }
  if (inner instanceof z.ZodBoolean) {
    return "boolean";
  }

  if (inner instanceof z.ZodArray) {
    return `Array<${printNode(inner.element, indent)}>`;
  }

  if (inner instanceof z.ZodRecord) {
    const keyDesc = inner.keySchema.description;
    const key = keyDesc ? `/** ${keyDesc} */ [key: string]` : "[key: string]";
    return `{ ${key}: ${printNode(inner.valueSchema, indent + 1)} }`;
  }

  if (inner instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = inner.shape;
    const lines = Object.entries(shape).map(([key, fieldSchema]) => {
      let description = fieldSchema.description;
      let temp = fieldSchema;
      while (
        !description &&
        (temp instanceof z.ZodOptional || temp instanceof z.ZodNullable)
      ) {
        temp = temp.unwrap();
        description = temp.description;
      }

      const fieldDesc = description ? `  /** ${description} */\n` : "";
      const isFieldOptional = fieldSchema.isOptional();
      const typeStr = printNode(fieldSchema, indent + 1);

      return `${pad}  ${fieldDesc}${pad}  ${key}${isFieldOptional ? "?" : ""}: ${typeStr};`;
    });
    return `{\n${lines.join("\n")}\n${pad}}`;
  }

  if (inner instanceof z.ZodEnum) {
    const options: string[] = inner.options;
    return options.map((o) => `"${o}"`).join(" | ");
  }

  if (inner instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = inner.options;
    return options.map((o) => printNode(o, indent)).join(" | ");
  }

  if (inner instanceof z.ZodLiteral) {
    return JSON.stringify(inner.value);
  }

  return "unknown";
}
