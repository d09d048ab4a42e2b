import { describeError } from "../errors.js";
import type { JsonValue } from "../json.js";

/** Sheet-derived document served by the Apps Script endpoint; shape is not ours. */
export type CollegeData = JsonValue;

/** Inline marker returned instead of throwing; the prompt carries it to the model. */
export type FetchFailure = { error: string };

export const NOT_CONFIGURED_MESSAGE = "Could not fetch live data. APPS_SCRIPT_URL not configured.";
export const FETCH_FAILED_MESSAGE = "Could not fetch live data.";

function logUpstream(url: string, res: Response) {
  const ct = res.headers.get("content-type") || "";
  console.log(`[data] GET ${url} -> ${res.status} ${ct}`);
}

export function isFetchFailure(x: CollegeData): x is FetchFailure {
  return Boolean(x && typeof x === "object" && !Array.isArray(x) && typeof x.error === "string");
}

/**
 * Fetches the latest college data. Never throws: a missing URL, a network
 * error, a non-2xx status or a non-JSON body all come back as `{ error }`.
 */
export async function fetchCollegeData(url: string | undefined): Promise<CollegeData> {
  if (!url) return { error: NOT_CONFIGURED_MESSAGE };

  try {
    const res = await fetch(url, { headers: { accept: "application/json" } });
    logUpstream(url, res);
    if (!res.ok) {
      console.error(`[data] upstream returned ${res.status}`);
      return { error: FETCH_FAILED_MESSAGE };
    }
    const txt = await res.text();
    const body: JsonValue = JSON.parse(txt);
    return body;
  } catch (e) {
    console.error(`[data] error fetching college data: ${describeError(e)}`);
    return { error: FETCH_FAILED_MESSAGE };
  }
}
