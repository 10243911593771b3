/**
 * Format milliseconds as a cue timestamp: MM:SS.TTT
 * Minutes are not wrapped into hours, so long clips give three digit minutes.
 */
export function formatCueTimestamp(ms: number): string {
  const minutes = Math.trunc(ms / 60000)
  const seconds = (ms - minutes * 60000) / 1000

  return `${minutes.toString().padStart(2, '0')}:${seconds.toFixed(3).padStart(6, '0')}`
}

/**
 * Escape HTML special characters to prevent tag conflicts in VTT.
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}
