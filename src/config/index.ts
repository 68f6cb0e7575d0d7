export { readEnvConfig } from "./env";
