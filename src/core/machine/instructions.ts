// src/core/machine/instructions.ts
export enum CharCode {
  NEWLINE = 10,  // '\n'
  BANG = 33,     // '!' inline input separator
  HASH = 35,     // '#' debug dump
  ADD = 43,      // '+'
  COMMA = 44,    // ','
  SUB = 45,      // '-'
  DOT = 46,      // '.'
  LT = 60,       // '<'
  GT = 62,       // '>'
  AT = 64,       // '@' reset
  LB = 91,       // '['
  RB = 93,       // ']'
}
