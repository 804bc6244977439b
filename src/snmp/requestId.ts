import { randomInt } from 'node:crypto'

/** Exclusive upper bound of a request id: ids are non-negative 32-bit signed integers */
const ID_LIMIT = 2 ** 31

export type RequestIdSource = () => number

/**
 * Draw a fresh request id from the operating system's CSPRNG.
 *
 * Ids are unpredictable, so a reply cannot be forged by guessing them and they
 * do not reveal when the process started.
 */
export const nextRequestId: RequestIdSource = () => randomInt(0, ID_LIMIT)
