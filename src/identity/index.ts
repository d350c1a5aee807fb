export * from "./identity";
export { formatRunDate, findUnsupportedDirective } from "./date-format";
