/** JSON-RPC error codes the game may return. */
export const RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/** Reserved band for game-defined errors. */
export const APPLICATION_ERROR_MIN = -32099;
export const APPLICATION_ERROR_MAX = -32000;

const STANDARD_CODES: ReadonlySet<number> = new Set<number>(Object.values(RPC_ERROR));

/**
 * Clamp a code into the ranges a strict JSON-RPC consumer accepts.
 * Not applied by the codec: responses carry the code the game sent.
 */
export function normalizeErrorCode(code: number): number {
  if (STANDARD_CODES.has(code)) return code;
  if (code >= APPLICATION_ERROR_MIN && code <= APPLICATION_ERROR_MAX) return code;
  return RPC_ERROR.INTERNAL_ERROR;
}
