/**
 * Unix-seconds clock shared by the attestation collaborators.
 */

export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));
