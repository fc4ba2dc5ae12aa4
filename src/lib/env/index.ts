export { formatEnvIssues, getEnv, parseEnv, type Env } from "./env";
