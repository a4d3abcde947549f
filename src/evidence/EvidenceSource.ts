import { EvidenceItem, EvidenceKind, Result } from '../types';

/** Resolves one kind of evidence reference into text plus metadata. */
export interface EvidenceSource {
  readonly kind: EvidenceKind;
  fetch(identifier: string): Promise<Result<EvidenceItem>>;
}

export function freezeItem(item: EvidenceItem): EvidenceItem {
  return Object.freeze({ ...item, metadata: Object.freeze({ ...item.metadata }) });
}
