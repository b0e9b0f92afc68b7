import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

/** Colors as picocolors detects them for this terminal */
export const terminalColors: Colors = pc;

export const plainColors: Colors = pc.createColors(false);
