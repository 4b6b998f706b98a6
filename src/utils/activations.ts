import { z } from "zod";
import { API_TIMEOUT_MS, SOTA_API_URL } from "./config";
import { FetchError } from "./errors";
import { Point } from "./geoBounds";
import { FetchLike } from "./tileCache";

export const activationRecordSchema = z.object({
  summit: z.object({
    code: z.string(),
    name: z.string(),
    coordinates: z.object({
      latitude: z.number(),
      longitude: z.number(),
    }),
  }),
  date: z.string(),
});

export const activationsResponseSchema = z.array(activationRecordSchema);

export type ActivationRecord = z.infer<typeof activationRecordSchema>;

export interface Activation {
  summitCode: string;
  summitName: string;
  lat: number;
  lon: number;
  /** YYYY-MM-DD */
  date: string;
}

export interface FetchActivationsOptions {
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export function toActivation(record: ActivationRecord): Activation {
  return {
    summitCode: record.summit.code,
    summitName: record.summit.name,
    lat: record.summit.coordinates.latitude,
    lon: record.summit.coordinates.longitude,
    date: record.date.slice(0, 10),
  };
}

export function toPoints(activations: Activation[]): Point[] {
  return activations.map(({ lat, lon }) => ({ lat, lon }));
}

// Fetch every activation logged by the callsign from the sotl.as API
export async function fetchActivations(
  callsign: string,
  options: FetchActivationsOptions = {}
): Promise<Activation[]> {
  const {
    apiBaseUrl = SOTA_API_URL,
    timeoutMs = API_TIMEOUT_MS,
    fetchImpl = fetch,
  } = options;
  const url = `${apiBaseUrl}/activations/${encodeURIComponent(callsign.toUpperCase())}`;

  console.log("📡 fetching sota activations");

  let resp: Response;
  try {
    resp = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    throw new FetchError(`Activation request failed: ${url}`, url, undefined, err);
  }

  if (!resp.ok) {
    const text = await resp.text().catch(() => "");
    throw new FetchError(`Activation API error: ${resp.status} - ${text}`, url, resp.status);
  }

  let data: unknown;
  try {
    data = await resp.json();
  } catch (err) {
    throw new FetchError(`Activation API returned invalid JSON: ${url}`, url, resp.status, err);
  }

  const parsed = activationsResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new FetchError(
      `Activation API returned an unexpected body: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      url,
      resp.status,
      parsed.error
    );
  }

  return parsed.data.map(toActivation);
}
