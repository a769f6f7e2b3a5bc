import { GatewayError } from "../../model/gateway.errors"

/** Most keys one ListObjectsV2 page returns */
export const MAX_LIST_LIMIT = 1000

export function assertValidListLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw GatewayError.invalidListLimit(limit, MAX_LIST_LIMIT)
  }
}
