import crypto from "crypto";
import { z } from "zod";
import { NotInferrable, annotated, field, returns, tool } from "../ToolTypes";

export enum TextCase {
  Upper = "upper",
  Lower = "lower",
  Title = "title",
}

export const changeCase = tool(
  {
    description: "Change the letter case of a piece of text",
    params: {
      text: annotated(z.string(), "The text to transform"),
      mode: field(z.nativeEnum(TextCase), { description: "Target case", default: TextCase.Lower }),
    },
    returns: returns(z.string(), "The transformed text"),
  },
  function changeCase({ text, mode }) {
    switch (mode) {
      case TextCase.Upper:
        return text.toUpperCase();
      case TextCase.Lower:
        return text.toLowerCase();
      case TextCase.Title:
        return text.toLowerCase().replace(/\b[a-z]/g, c => c.toUpperCase());
    }
  }
);

export const countWords = tool(
  {
    description: "Count the words in a piece of text",
    params: { text: z.string().describe("The text to count") },
    returns: z.number().int().describe("Number of whitespace separated words"),
  },
  function countWords({ text }) {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
  }
);

export const signText = tool(
  {
    description: "Sign text with HMAC-SHA256 using a key held in the worker's secrets",
    params: {
      text: annotated(z.string(), "The text to sign"),
      secretName: annotated(z.string(), "secret_name", "Name of the secret that holds the signing key", NotInferrable),
    },
    returns: returns(z.string(), "Hex encoded signature"),
  },
  function signText({ text, secretName }, context) {
    return crypto.createHmac("sha256", context.getSecret(secretName)).update(text).digest("hex");
  }
);
