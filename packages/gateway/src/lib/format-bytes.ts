const UNITS = ["KB", "MB", "GB", "TB"] as const

/**
 * Human-readable size in binary units: 512 is "512 B", 1536 is "1.5 KB".
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`

  let value = bytes / 1024
  let unit = 0

  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024
    unit += 1
  }

  return `${value.toFixed(1)} ${UNITS[unit]}`
}
