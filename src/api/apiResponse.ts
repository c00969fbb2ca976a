import type { JsonObject, JsonValue } from "type-fest";

export type RawValueField = number | string | boolean;
export type RawValue = number | string | Uint8Array | readonly RawValueField[];

export type ValidApiResponse = {
  readonly status: "valid";
  readonly objectId: number;
  readonly time: Date;
  readonly value: RawValue;
};

export type InvalidApiResponse = {
  readonly status: "invalid";
  readonly objectId: number;
  readonly time: Date;
  readonly reason: string;
};

export type ApiResponse = ValidApiResponse | InvalidApiResponse;

export function isValidApiResponse(
  response: ApiResponse | undefined,
): response is ValidApiResponse {
  return response?.status === "valid";
}

export function getValidResponseValueOr<T>(
  response: ApiResponse | undefined,
  defaultValue: T,
): RawValue | T {
  return isValidApiResponse(response) ? response.value : defaultValue;
}

export function isBytes(value: RawValue): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function isStructured(
  value: RawValue,
): value is readonly RawValueField[] {
  return Array.isArray(value);
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

/**
 * JSONとして送信できる形に変換する
 */
export function toJsonValue(value: RawValue): JsonValue {
  if (isBytes(value)) {
    return toHex(value);
  }
  if (isStructured(value)) {
    return [...value];
  }
  return value;
}

export function toApiResponseRecord(response: ApiResponse): JsonObject {
  const record = {
    object_id: response.objectId,
    time: response.time.toISOString(),
  };

  return response.status === "valid"
    ? { ...record, value: toJsonValue(response.value) }
    : { ...record, reason: response.reason };
}
