export type AiProvider = "auto" | "openai" | "codex" | "claude";
export type OutputFormat = "text" | "json";
