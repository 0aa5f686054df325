export { openProject, type Project, type ProjectOptions } from "./project";
export { runCommand, type RunOptions } from "./run";
export { statusCommand, type StatusOptions } from "./status";
export { initCommand, type InitOptions } from "./init";
export { watchCommand, type WatchOptions } from "./watch";
