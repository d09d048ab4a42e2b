import fs from "fs";
import path from "path";
import { describeError } from "./errors.js";

export type PromptMode = "embed" | "tool";

export type Persona = {
  assistantName: string;
  institutionName: string;
  creator: string;
};

export type AppConfig = {
  port: number;
  appsScriptUrl?: string;           // optional: data fetching is disabled without it
  googleApiKey?: string;            // optional: chat replies "not configured" without it
  geminiModel: string;
  promptMode: PromptMode;
  maxToolRounds: number;
  imagesDir: string;
  persona: Persona;
};

type Env = Record<string, string | undefined>;

function envStr(env: Env, name: string): string | undefined {
  return (env[name] ?? "").trim() || undefined;
}

function envInt(env: Env, name: string, def: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return def;
  const v = Number(raw);
  return Number.isInteger(v) && v > 0 ? v : def;
}

function envPromptMode(env: Env, name: string, def: PromptMode): PromptMode {
  const v = (env[name] ?? "").toLowerCase().trim();
  if (v === "embed" || v === "tool") return v;
  return def;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const port = envInt(env, "PORT", 8080);

  // A key file wins only when the variable itself is empty (Docker/K8s secrets).
  const keyFile = envStr(env, "GOOGLE_API_KEY_FILE");
  const googleApiKey =
    readSecret({ type: "env", name: "GOOGLE_API_KEY" }, env) ||
    (keyFile ? readSecret({ type: "file", path: keyFile }, env) : "") ||
    undefined;

  const imagesDir = envStr(env, "IMAGES_DIR") ?? path.resolve(process.cwd(), "images");

  return {
    port,
    appsScriptUrl: envStr(env, "APPS_SCRIPT_URL"),
    googleApiKey,
    geminiModel: envStr(env, "GEMINI_MODEL") ?? "gemini-2.0-flash-lite",
    promptMode: envPromptMode(env, "PROMPT_MODE", "embed"),
    maxToolRounds: envInt(env, "MAX_TOOL_ROUNDS", 5),
    imagesDir,
    persona: {
      assistantName: envStr(env, "ASSISTANT_NAME") ?? "Sankalp",
      institutionName: envStr(env, "INSTITUTION_NAME") ?? "SSIPMT",
      creator: envStr(env, "ASSISTANT_CREATOR") ?? "the SSIPMT student developer team",
    },
  };
}

export function readSecret(ref: { type: "env" | "file"; name?: string; path?: string }, env: Env = process.env): string {
  if (ref.type === "env") {
    const key = (ref.name || "").trim();
    return key ? (env[key] ?? "").trim() : "";
  }
  const p = (ref.path || "").trim();
  if (!p) return "";
  try {
    return fs.readFileSync(p, "utf-8").trim();
  } catch (e) {
    console.error(`[config] could not read secret file ${p}: ${describeError(e)}`);
    return "";
  }
}

/** Report missing optional settings once at start-up; never fatal. */
export function reportMissingConfig(cfg: AppConfig): string[] {
  const missing: string[] = [];
  if (!cfg.appsScriptUrl) missing.push("APPS_SCRIPT_URL");
  if (!cfg.googleApiKey) missing.push("GOOGLE_API_KEY");
  for (const name of missing) {
    console.error(`[config] ${name} environment variable not set.`);
  }
  return missing;
}
