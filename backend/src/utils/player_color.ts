import { createHash } from "crypto";

export const CPU_COLOR = "#9E9E9E";

// Saturation and lightness chosen to read well on the dark page background
const SATURATION = 75;
const LIGHTNESS = 60;

export function getColorForName(name: string): string {
  if (name.toUpperCase().startsWith("CPU")) return CPU_COLOR;

  const digest = createHash("md5").update(name, "utf8").digest("hex");
  const hue = Number(BigInt(`0x${digest}`) % 360n);
  return `hsl(${hue}, ${SATURATION}%, ${LIGHTNESS}%)`;
}
