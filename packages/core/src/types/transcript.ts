export interface TranscriptEntry<TAction = unknown> {
  sequence: number;
  action: TAction;
  stateHash: string;
  prevHash: string;
}

export interface HandTranscript<TAction = unknown> {
  matchId: string;
  gameId: string;
  initialHash: string;
  entries: TranscriptEntry<TAction>[];
  rootHash: string;
}
