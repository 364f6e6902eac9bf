import type { ResponsePayload } from "./types";

export function plain<T>(data: T): ResponsePayload<T> {
  return { kind: "plain", data };
}

export function withParams<T>(params: readonly string[], data: T): ResponsePayload<T> {
  return { kind: "withParams", params, data };
}

export function unpackPayload<T>(payload: ResponsePayload<T>): { data: T; params: readonly string[] } {
  switch (payload.kind) {
    case "plain":
      return { data: payload.data, params: [] };
    case "withParams":
      return { data: payload.data, params: payload.params };
  }
}
