import { keccak256, toUtf8Bytes } from "ethers";
import type { HandTranscript, TranscriptEntry } from "../types/transcript";
import { canonicalEncode } from "./Encoding";

/** keccak256 of the canonical encoding; equal states hash equally. */
export function hashState(state: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(state)));
}

/** Next link of a hand's chain: H(prevHash || encode(entry)). */
export function chainHash<TAction>(
  prevHash: string,
  entry: TranscriptEntry<TAction>
): string {
  return keccak256(toUtf8Bytes(prevHash + canonicalEncode(entry)));
}

/**
 * Recompute a transcript's chain from its initial hash. False when any entry
 * is out of sequence, was edited, or the root does not close the chain.
 */
export function verifyTranscript<TAction>(
  transcript: HandTranscript<TAction>
): boolean {
  let link = transcript.initialHash;
  for (const [index, entry] of transcript.entries.entries()) {
    if (entry.sequence !== index || entry.prevHash !== link) return false;
    link = chainHash(link, entry);
  }
  return link === transcript.rootHash;
}
