/**
 * The slice of the fetch API the service clients use. Global `fetch`
 * satisfies it; tests pass a fake.
 */
export type FetchInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
};

export type FetchResponse = {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
};

export type FetchLike = (input: string, init?: FetchInit) => Promise<FetchResponse>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
