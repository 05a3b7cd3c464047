/**
 * Counts tokens of a text as seen by a model's tokenizer
 */
export interface ITokenCounter {
  /**
   * @throws UnsupportedModelError when no tokenizer resolves for `model`
   */
  count(text: string, model: string): number;
}
