import axios from "axios";

/**
 * Pull side of the signal reader. Resolves with the raw reading payload,
 * or null when the reader has nothing new.
 */
export interface SignalSource {
  readonly name: string;
  read(): Promise<unknown | null>;
}

export class HttpSignalSource implements SignalSource {
  readonly name = "http-signal-reader";
  private lastTimestamp: string | null = null;

  constructor(
    private readonly url: string,
    private readonly timeoutMs: number = 2000
  ) {}

  async read(): Promise<unknown | null> {
    const response = await axios.get<unknown>(this.url, {
      timeout: this.timeoutMs,
      validateStatus: (status) => status === 200 || status === 204,
    });
    if (response.status === 204 || response.data === null || response.data === "") {
      return null;
    }

    // The reader serves its latest reading until a fresher one appears
    const stamp = timestampOf(response.data);
    if (stamp !== null && stamp === this.lastTimestamp) return null;
    this.lastTimestamp = stamp;
    return response.data;
  }
}

function timestampOf(data: unknown): string | null {
  if (typeof data !== "object" || data === null || !("timestamp" in data)) return null;
  const { timestamp } = data;
  return typeof timestamp === "string" || typeof timestamp === "number" ? String(timestamp) : null;
}
