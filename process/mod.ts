export * from "./src/exec.ts";
