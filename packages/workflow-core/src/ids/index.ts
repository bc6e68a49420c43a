export { generateId, parseId } from "./generator.js";
