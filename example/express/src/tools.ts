import { z } from "zod";
import { defineTool, type LocalTool } from "agentry";
import { Logger } from "agentry-kernel";

const log = Logger.for("ExampleTools");

const CalculatorInputSchema = z.object({
  operation: z.enum(["add", "subtract", "multiply", "divide"]).describe("Arithmetic operation"),
  a: z.number(),
  b: z.number(),
});

type CalculatorInput = z.infer<typeof CalculatorInputSchema>;

export function calculate({ operation, a, b }: CalculatorInput): number {
  switch (operation) {
    case "add":
      return a + b;
    case "subtract":
      return a - b;
    case "multiply":
      return a * b;
    case "divide":
      if (b === 0) {
        throw new Error("Cannot divide by zero");
      }
      return a / b;
  }
}

export const calculatorTool: LocalTool = defineTool({
  name: "calculator",
  description: "Performs basic arithmetic on two numbers",
  input: CalculatorInputSchema,
  group: "Utilities",
  handler: (input) => {
    const result = calculate(input);
    log.debug({ ...input, result }, "Calculation complete");
    return result;
  },
});

export const clockTool: LocalTool = defineTool({
  name: "current_time",
  description: "Current date and time in ISO 8601 format (UTC)",
  input: z.object({}),
  group: "Utilities",
  handler: () => new Date().toISOString(),
});

export const exampleTools: LocalTool[] = [calculatorTool, clockTool];
