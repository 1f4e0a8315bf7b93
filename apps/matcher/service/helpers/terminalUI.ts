/**
 * Terminal UI Helper Module
 *
 * Provides terminal output using ora spinners and chalk styling for the
 * GeoMatch CLI.
 */

import chalk, { type Chalk } from "chalk";
import ora, { type Ora } from "ora";
import type { MatchStatus } from "../types";

// ---------------------------------------------------------------------------------
// Theme Configuration
// ---------------------------------------------------------------------------------

/**
 * Color palette for consistent terminal styling across the application.
 */
export const theme = {
    /** Primary brand color - used for main headings and important info */
    primary: chalk.hex("#0F766E"),
    /** Secondary accent color - used for highlights and emphasis */
    secondary: chalk.hex("#06B6D4"),
    /** Success color - used for completed operations and positive feedback */
    success: chalk.hex("#10B981"),
    /** Warning color - used for cautions and non-critical alerts */
    warning: chalk.hex("#F59E0B"),
    /** Error color - used for failures and critical issues */
    error: chalk.hex("#EF4444"),
    /** Muted color - used for less important information */
    muted: chalk.hex("#6B7280"),
    /** Info color - used for general information */
    info: chalk.hex("#3B82F6"),
    /** Highlight color - used for key values and emphasis */
    highlight: chalk.hex("#EC4899"),
    /** Dim text - used for supplementary information */
    dim: chalk.dim,
    /** Bold text - used for emphasis */
    bold: chalk.bold,
} as const;

// ---------------------------------------------------------------------------------
// ASCII Art & Branding
// ---------------------------------------------------------------------------------

/**
 * ASCII art logo, displayed at startup.
 */
const LOGO = `
${theme.primary("   ______           __  ___      __       __  ")}
${theme.primary("  / ____/__  ____  /  |/  /___ _/ /______/ /_ ")}
${theme.secondary(" / / __/ _ \\/ __ \\/ /|_/ / __ '/ __/ ___/ __ \\")}
${theme.secondary("/ /_/ /  __/ /_/ / /  / / /_/ / /_/ /__/ / / /")}
${theme.primary("\\____/\\___/\\____/_/  /_/\\__,_/\\__/\\___/_/ /_/ ")}
`;

/**
 * Displays the GeoMatch logo and version information.
 *
 * @param version - The current version string to display.
 */
export function displayBanner(version?: string): void {
    if (isDaemonMode) return;
    console.log(LOGO);
    console.log(
        theme.muted("  ─────────────────────────────────────────────────────"),
    );
    console.log(`  ${theme.bold("Nearest-Facility Geo Matching Engine")}`);
    if (version) {
        console.log(`  ${theme.muted(`Version ${version}`)}`);
    }
    console.log(
        theme.muted(
            "  ─────────────────────────────────────────────────────\n",
        ),
    );
}

// ---------------------------------------------------------------------------------
// Spinner Management
// ---------------------------------------------------------------------------------

/** Current active spinner instance for sequential operations */
let currentSpinner: Ora | null = null;

/** Flag indicating whether we're in daemon/silent mode */
let isDaemonMode = false;

/**
 * Sets the daemon mode flag. When enabled, all terminal output is suppressed.
 *
 * @param enabled - Whether daemon mode should be enabled.
 */
export function setDaemonMode(enabled: boolean): void {
    isDaemonMode = enabled;
}

/**
 * Checks if the application is running in daemon mode.
 *
 * @returns True if running in daemon mode, false otherwise.
 */
export function getDaemonMode(): boolean {
    return isDaemonMode;
}

/**
 * Custom spinner frames for a unique visual style.
 */
const spinnerFrames = ["◐", "◓", "◑", "◒"];

/**
 * Creates and starts a new spinner with the given message.
 * In daemon mode the spinner is silent.
 *
 * @param text - The message to display alongside the spinner.
 * @returns The ora spinner instance.
 */
export function startSpinner(text: string): Ora {
    // Stop any existing spinner
    if (currentSpinner?.isSpinning) {
        currentSpinner.stop();
    }

    currentSpinner = ora({
        text: theme.info(text),
        spinner: {
            interval: 80,
            frames: spinnerFrames,
        },
        color: "cyan",
        isSilent: isDaemonMode,
    }).start();

    return currentSpinner;
}

/**
 * Updates the current spinner's text.
 *
 * @param text - The new text to display.
 */
export function updateSpinner(text: string): void {
    if (isDaemonMode || !currentSpinner) return;
    currentSpinner.text = theme.info(text);
}

/**
 * Marks the current spinner as successful with a completion message.
 *
 * @param text - Optional success message. Uses spinner text if not provided.
 */
export function succeedSpinner(text?: string): void {
    if (!currentSpinner) return;
    currentSpinner.succeed(theme.success(text || currentSpinner.text));
    currentSpinner = null;
}

/**
 * Marks the current spinner as failed with an error message.
 *
 * @param text - Optional error message. Uses spinner text if not provided.
 */
export function failSpinner(text?: string): void {
    if (!currentSpinner) return;
    currentSpinner.fail(theme.error(text || currentSpinner.text));
    currentSpinner = null;
}

/**
 * Marks the current spinner with a warning message.
 *
 * @param text - Optional warning message. Uses spinner text if not provided.
 */
export function warnSpinner(text?: string): void {
    if (!currentSpinner) return;
    currentSpinner.warn(theme.warning(text || currentSpinner.text));
    currentSpinner = null;
}

// ---------------------------------------------------------------------------------
// Logging Functions
// ---------------------------------------------------------------------------------

/**
 * Logs a success message with a checkmark icon.
 *
 * @param message - The message to log.
 */
export function logSuccess(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.success("✔")} ${message}`);
}

/**
 * Logs an error message with an X icon. Errors are printed in daemon mode
 * too.
 *
 * @param message - The message to log.
 * @param error - Optional error for its message and stack trace.
 */
export function logError(message: string, error?: unknown): void {
    console.error(`${theme.error("✖")} ${theme.error(message)}`);
    if (error instanceof Error) {
        console.error(theme.dim(error.stack ?? error.message));
    } else if (error !== undefined) {
        console.error(theme.dim(String(error)));
    }
}

/**
 * Logs a warning message with a warning icon.
 *
 * @param message - The message to log.
 */
export function logWarning(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.warning("⚠")} ${theme.warning(message)}`);
}

/**
 * Logs an info message with an info icon.
 *
 * @param message - The message to log.
 */
export function logInfo(message: string): void {
    if (isDaemonMode) return;
    console.log(`${theme.info("ℹ")} ${message}`);
}

// ---------------------------------------------------------------------------------
// Progress Indicators
// ---------------------------------------------------------------------------------

/**
 * Creates a visual progress bar string.
 *
 * @param current - Current progress value.
 * @param total - Total value for 100% completion.
 * @param width - Width of the progress bar in characters.
 * @returns Formatted progress bar string.
 */
export function createProgressBar(
    current: number,
    total: number,
    width = 30,
): string {
    const ratio = total > 0 ? current / total : 1;
    const percentage = Math.min(100, Math.max(0, ratio * 100));
    const filled = Math.round((percentage / 100) * width);
    const empty = width - filled;

    const filledBar = theme.secondary("█".repeat(filled));
    const emptyBar = theme.dim("░".repeat(empty));
    const percentText = theme.bold(`${percentage.toFixed(1)}%`);

    return `${filledBar}${emptyBar} ${percentText}`;
}

/**
 * Formats a number with thousands separators for readability.
 *
 * @param num - The number to format.
 * @returns Formatted number string with commas.
 */
export function formatNumber(num: number): string {
    return num.toLocaleString("en-US");
}

/**
 * Formats a ratio as a percentage.
 *
 * @param ratio - Value between 0 and 1.
 * @returns Percentage with two decimals (e.g., "12.50%").
 */
export function formatPercent(ratio: number): string {
    return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * Formats a duration in milliseconds to a human-readable string.
 *
 * @param ms - Duration in milliseconds.
 * @returns Human-readable duration (e.g., "2h 15m 30s").
 */
export function formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);

    if (hours > 0) {
        return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
    }
    if (minutes > 0) {
        return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
}

// ---------------------------------------------------------------------------------
// Section Headers
// ---------------------------------------------------------------------------------

/**
 * Displays a styled section header for organizing output.
 *
 * @param title - The section title to display.
 */
export function displaySection(title: string): void {
    if (isDaemonMode) return;
    console.log();
    console.log(`${theme.primary("▸")} ${theme.bold(title)}`);
    console.log(theme.muted(`  ${"─".repeat(title.length + 2)}`));
}

// ---------------------------------------------------------------------------------
// Status Tables
// ---------------------------------------------------------------------------------

/**
 * Displays key-value pairs in a formatted table style.
 *
 * @param data - Object containing key-value pairs to display.
 * @param indent - Number of spaces to indent the table.
 */
export function displayKeyValue(
    data: Record<string, string | number | boolean>,
    indent = 2,
): void {
    if (isDaemonMode) return;

    const padding = " ".repeat(indent);
    const maxKeyLength = Math.max(...Object.keys(data).map((k) => k.length));

    for (const [key, value] of Object.entries(data)) {
        const paddedKey = key.padEnd(maxKeyLength);
        console.log(
            `${padding}${theme.muted(paddedKey)}  ${theme.highlight(String(value))}`,
        );
    }
}

// ---------------------------------------------------------------------------------
// Status Styling
// ---------------------------------------------------------------------------------

/**
 * Color per match status.
 */
const statusColors: Record<MatchStatus, Chalk> = {
    matched: theme.success,
    unmatched: theme.muted,
    failed: theme.error,
};

/**
 * Formats a match status with its color.
 *
 * @param status - The status to format.
 * @returns Colored status string.
 */
export function formatStatus(status: MatchStatus): string {
    return statusColors[status].bold(status);
}

// ---------------------------------------------------------------------------------
// Box Drawing
// ---------------------------------------------------------------------------------

/**
 * Displays a boxed message for important announcements.
 *
 * @param message - The message to display in the box.
 * @param type - The type of message (affects color).
 */
export function displayBox(
    message: string,
    type: "info" | "success" | "warning" | "error" = "info",
): void {
    if (isDaemonMode) return;

    const colorMap = {
        info: theme.info,
        success: theme.success,
        warning: theme.warning,
        error: theme.error,
    };

    const color = colorMap[type];
    const border = color("─".repeat(message.length + 4));
    const side = color("│");

    console.log(`${color("┌")}${border}${color("┐")}`);
    console.log(`${side}  ${message}  ${side}`);
    console.log(`${color("└")}${border}${color("┘")}`);
}
