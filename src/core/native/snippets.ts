// src/core/native/snippets.ts
// C fragments emitted for each of the eight primitive instructions

export const SNIPPETS: Readonly<Record<string, string>> = {
  ">": "p++;",
  "<": "p--;",
  "+": "t[p]++;",
  "-": "t[p]--;",
  ".": "putchar(t[p]);",
  ",": "t[p]=getchar();",
  "[": "while(t[p]){",
  "]": "}",
};

/** Lookup by byte; undefined for anything that is not an instruction. */
const BY_BYTE: ReadonlyMap<number, string> = new Map(
  Object.entries(SNIPPETS).map(([ch, code]) => [ch.charCodeAt(0), code])
);

export function snippetFor(byte: number): string | undefined {
  return BY_BYTE.get(byte);
}

export function prologue(tapeSize: number): string {
  return `#include <stdio.h>\nint main(void) {unsigned char t[${tapeSize}]={0};int p=0;`;
}

export const EPILOGUE = "return 0;}\n";
