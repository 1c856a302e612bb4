const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable byte count: "512 B", "2.00 KB", "1.00 MB".
 * Returns "N/A" when the size is unknown.
 */
export function formatSize(sizeBytes: number | undefined): string {
  if (sizeBytes === undefined) {
    return "N/A";
  }

  let size = sizeBytes;
  for (let i = 0; i < SIZE_UNITS.length; i++) {
    const unit = SIZE_UNITS[i];
    if (size < 1024 || i === SIZE_UNITS.length - 1) {
      return unit === "B" ? `${Math.trunc(size)} B` : `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${sizeBytes} B`;
}

/**
 * Human-readable duration: "32 ms", "3.210 s", "1 m 15 s", "1 h 1 m".
 */
export function formatDuration(seconds: number): string {
  if (seconds < 1) {
    return `${(seconds * 1000).toFixed(0)} ms`;
  }
  if (seconds < 60) {
    return `${seconds.toFixed(3)} s`;
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes} m ${(seconds - minutes * 60).toFixed(0)} s`;
  }
  return `${Math.floor(minutes / 60)} h ${minutes % 60} m`;
}
