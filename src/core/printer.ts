// src/core/printer.ts
// Value display

import type { Val } from "./eval/values";

export type FormatOptions = {
  /** Quote strings so the output reads back as a literal */
  readable?: boolean;
};

function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf";
  // exponent form outside 1e-4 <= |n| < 1e16, with at least two exponent digits
  const [mantissa, exp] = n.toExponential().split("e");
  const e = Number(exp);
  if (e < -4 || e >= 16) {
    return `${mantissa}e${e < 0 ? "-" : "+"}${String(Math.abs(e)).padStart(2, "0")}`;
  }
  return Number.isInteger(n) ? n.toFixed(1) : String(n);
}

export function formatValue(v: Val, options: FormatOptions = {}): string {
  switch (v.tag) {
    case "Unit": return "";
    case "Int": return v.value.toString();
    case "Float": return formatFloat(v.value);
    case "Str": return options.readable ? JSON.stringify(v.s) : v.s;
    case "Builtin": return `#<builtin ${v.name}>`;
    case "Closure": return `#<lambda ${v.name} (${v.params.join(" ")}) ${v.source}>`;
  }
}
