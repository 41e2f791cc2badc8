export { type GeneratedSource, generate } from "./generate.js";
