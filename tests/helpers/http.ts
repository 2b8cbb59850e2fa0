import sinon from "sinon";

export type FetchStub = sinon.SinonStub<Parameters<typeof fetch>, Promise<Response>>;

export function createFetchStub(): FetchStub {
  return sinon.stub<Parameters<typeof fetch>, Promise<Response>>();
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

export function htmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/html; charset=utf-8" } });
}

export function textResponse(body: string, status = 200, contentType = "text/plain"): Response {
  return new Response(body, { status, headers: { "content-type": contentType } });
}

/** URL requested by the `index`-th call of a fetch stub. */
export function requestedUrl(stub: FetchStub, index = 0): string {
  const input = stub.getCall(index).args[0];
  if (typeof input === "string") {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
}
