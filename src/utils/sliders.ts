export interface SliderConfig {
  min: number;
  max: number;
  step: number;
  value: number;
  marks: Record<number, string>;
}

/**
 * Slider marks every `every` units, labelled with the value divided by
 * `scale` (truncated to an integer) and a percent sign
 */
export function buildPercentMarks(
  min: number,
  max: number,
  every: number,
  scale = 10,
): Record<number, string> {
  const marks: Record<number, string> = {};
  for (let value = min; value <= max; value += every) {
    marks[value] = `${Math.trunc(value / scale)} %`;
  }
  return marks;
}
