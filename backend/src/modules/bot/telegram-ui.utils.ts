export function escHtml(s: unknown): string {
  return String(s ?? '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/** Whole amounts print bare (`5`), fractional ones with two decimals (`9.50`). */
export function fmtAmount(n: number): string {
  return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

export function displayNameOf(from: { first_name?: string; username?: string } | undefined): string {
  return String(from?.first_name || from?.username || 'User').trim() || 'User';
}
