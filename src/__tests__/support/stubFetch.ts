const originalFetch = globalThis.fetch;

export const setFetch = (handler: typeof fetch): void => {
  globalThis.fetch = handler;
};

export const restoreFetch = (): void => {
  globalThis.fetch = originalFetch;
};

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });
