export type CostCategory = "text" | "image" | "speech";

/** Unit prices in USD. */
export interface PriceTable {
  textInputPer1k: number;
  textOutputPer1k: number;
  imagePerItem: number;
  speechPer1kChars: number;
}

export type CostObserver = (totalUsd: number) => void;

export const KRW_PER_USD = 1380;

function assertUnits(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Running spend for one job. Each add* call updates its category and then
 * notifies the observer synchronously with the new total.
 */
export class CostLedger {
  private readonly costs: Record<CostCategory, number> = { text: 0, image: 0, speech: 0 };
  private observer: CostObserver | null;

  constructor(private readonly prices: PriceTable, observer: CostObserver | null = null) {
    this.observer = observer;
  }

  addText(inputTokens: number, outputTokens: number): number {
    assertUnits("inputTokens", inputTokens);
    assertUnits("outputTokens", outputTokens);
    const cost =
      (inputTokens / 1000) * this.prices.textInputPer1k +
      (outputTokens / 1000) * this.prices.textOutputPer1k;
    return this.add("text", cost);
  }

  addImage(count = 1): number {
    assertUnits("count", count);
    return this.add("image", count * this.prices.imagePerItem);
  }

  addSpeech(characters: number): number {
    assertUnits("characters", characters);
    return this.add("speech", (characters / 1000) * this.prices.speechPer1kChars);
  }

  /** Replaces the current observer; pass null to detach. */
  setObserver(observer: CostObserver | null): void {
    this.observer = observer;
  }

  total(): number {
    return this.costs.text + this.costs.image + this.costs.speech;
  }

  totalKrw(rate = KRW_PER_USD): number {
    return Math.floor(this.total() * rate);
  }

  breakdown(): Record<CostCategory, number> {
    return { ...this.costs };
  }

  summary(): string {
    return [
      `Total: $${this.total().toFixed(4)} (~${this.totalKrw().toLocaleString("en-US")} KRW)`,
      `  text   : $${this.costs.text.toFixed(4)}`,
      `  image  : $${this.costs.image.toFixed(4)}`,
      `  speech : $${this.costs.speech.toFixed(4)}`,
    ].join("\n");
  }

  private add(category: CostCategory, cost: number): number {
    this.costs[category] += cost;
    this.observer?.(this.total());
    return cost;
  }
}
