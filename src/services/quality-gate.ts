export const DEFAULT_NOISE_MARKERS = [
  '[SILENCE_DETECTED]',
  '[noise]',
  '[inaudible]',
  '[music]',
  '[BLANK_AUDIO]',
  '(silence)',
  '...',
];

export interface QualityGateOptions {
  enabled: boolean;
  /** Minimum length of the trimmed transcript. */
  minChars?: number;
  noiseMarkers?: string[];
}

const BRACKETED_TAGS = /^(?:\s*[[(][^\])]*[\])])+\s*$/;

/**
 * Accept/reject check on a raw transcript before the pipeline trusts it.
 * When disabled every transcript passes.
 */
export class QualityGate {
  readonly enabled: boolean;
  private readonly minChars: number;
  private readonly noiseMarkers: Set<string>;

  constructor(options: QualityGateOptions) {
    this.enabled = options.enabled;
    this.minChars = options.minChars ?? 2;
    this.noiseMarkers = new Set((options.noiseMarkers ?? DEFAULT_NOISE_MARKERS).map((m) => m.toLowerCase()));
  }

  isUsable(text: string): boolean {
    if (!this.enabled) return true;

    const trimmed = text.trim();
    if (trimmed.length < this.minChars) return false;
    if (this.noiseMarkers.has(trimmed.toLowerCase())) return false;
    if (BRACKETED_TAGS.test(trimmed)) return false;
    return true;
  }
}
