import { Toolkit } from "../Toolkit";
import { VERSION } from "../../version";
import * as math from "./math";
import * as text from "./text";

export type BuiltinToolkit = "math" | "text";

export const builtinToolkits: Record<BuiltinToolkit, () => Toolkit> = {
  math: () => Toolkit.fromModule(math, { name: "Math", version: VERSION, description: "Arithmetic on integers and floats" }),
  text: () => Toolkit.fromModule(text, { name: "Text", version: VERSION, description: "Small text utilities" }),
};
