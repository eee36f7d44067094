export { Parser } from "./parser.ts";
