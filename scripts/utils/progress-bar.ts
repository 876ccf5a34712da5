const spinnerFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

// Progress output is only drawn on an interactive terminal; logs and tests stay clean
function isInteractive(): boolean {
  return Boolean(process.stdout.isTTY);
}

export function updateProgress(current: number, total: number, label: string, errors = 0) {
  if (!isInteractive() || total === 0) return;

  const width = 24;
  const filled = Math.round((current / total) * width);
  const bar = "█".repeat(filled) + "░".repeat(width - filled);
  const errorSuffix = errors > 0 ? ` (${errors} failed)` : "";
  process.stdout.write(`\r${label} [${bar}] ${current}/${total}${errorSuffix}`);

  if (current >= total) {
    process.stdout.write("\n");
  }
}

/**
 * Starts a spinner next to `label`. Returns a function that stops it and clears the line.
 */
export function progressSpinner(label: string): () => void {
  if (!isInteractive()) return () => {};

  let frame = 0;
  const timer = setInterval(() => {
    process.stdout.write(`\r${spinnerFrames[frame++ % spinnerFrames.length]} ${label}`);
  }, 80);

  return () => {
    clearInterval(timer);
    process.stdout.write(`\r${" ".repeat(label.length + 2)}\r`);
  };
}
