import { colors } from "consola/utils";

type LogColor = "cyan" | "green" | "yellow" | "orange" | "red" | "gray" | "white";

const PAINT: Record<LogColor, (text: string) => string> = {
    cyan: colors.cyan,
    green: colors.green,
    yellow: colors.yellow,
    orange: colors.yellow, // No orange in a 16 colour terminal.
    red: colors.red,
    gray: colors.gray,
    white: colors.white,
};

// Helper for logging.
function logProcess(process: string, color: LogColor, message: string, logFunc: (line: string) => void = console.log) {
    const timestamp = new Date().toLocaleTimeString("en-US", { hour12: false });
    logFunc(`[${timestamp}] [${PAINT[color](process)}] ${message}`);
}

export { logProcess };
export type { LogColor };
