import { terminalColors, type Colors } from "./output/colors.js";

/** Where a command writes: reports to out, faults to err */
export interface CommandIo {
  out(text: string): void;
  err(text: string): void;
  colors: Colors;
}

export const consoleIo: CommandIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  colors: terminalColors,
};
