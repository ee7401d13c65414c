import { z } from "zod";
import { ToolExecutionError } from "../ToolErrors";
import { annotated, returns, tool } from "../ToolTypes";

const integer = (description: string) => z.number().int().describe(description);
const number = (description: string) => z.number().describe(description);

export const add = tool(
  {
    description: "Add two integers",
    params: { a: integer("The first number"), b: integer("The second number") },
    returns: integer("The sum of the two numbers"),
  },
  function add({ a, b }) {
    return a + b;
  }
);

export const subtract = tool(
  {
    description: "Subtract the second integer from the first",
    params: { a: integer("The number to subtract from"), b: integer("The number to subtract") },
    returns: integer("The difference"),
  },
  function subtract({ a, b }) {
    return a - b;
  }
);

export const multiply = tool(
  {
    description: "Multiply two integers",
    params: { a: integer("The first factor"), b: integer("The second factor") },
    returns: integer("The product"),
  },
  function multiply({ a, b }) {
    return a * b;
  }
);

export const divide = tool(
  {
    description: "Divide one number by another",
    params: { a: number("The dividend"), b: number("The divisor") },
    returns: returns(z.number(), "The quotient"),
  },
  function divide({ a, b }) {
    if (b === 0) throw new ToolExecutionError("Cannot divide by zero");
    return a / b;
  }
);

export const sqrt = tool(
  {
    description: "Square root of a non-negative number",
    params: { a: annotated(z.number(), "The number to take the square root of") },
    returns: returns(z.number(), "The square root"),
  },
  function sqrt({ a }) {
    if (a < 0) {
      throw new ToolExecutionError("Cannot take the square root of a negative number", {
        developerMessage: `sqrt called with ${a}`,
      });
    }
    return Math.sqrt(a);
  }
);

export const sumList = tool(
  {
    description: "Sum a list of numbers",
    params: { numbers: annotated(z.array(z.number()), "The numbers to add up") },
    returns: returns(z.number(), "The total"),
  },
  function sumList({ numbers }) {
    return numbers.reduce((total, n) => total + n, 0);
  }
);
