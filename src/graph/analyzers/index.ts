export { connectivity } from "./connectivity";
export { detectCycles } from "./cycles";
export { eulerian } from "./eulerian";
export { allPaths, DEFAULT_MAX_PATHS, shortestPath } from "./paths";
