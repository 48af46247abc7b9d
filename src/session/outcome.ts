/**
 * Login outcome classification.
 * The client has no structured result, so success and failure are read from
 * its console text. All matching rules live here.
 */

export type LoginOutcome =
  | { kind: 'success' }
  | { kind: 'authChallengeRequired' }
  | { kind: 'invalidCredentials' }
  | { kind: 'unclassified'; output: string };

const READY_MARKER = 'Waiting for user info...OK';
const CHALLENGE_MARKERS = ['Steam Guard', 'Two-factor code'];
const INVALID_MARKERS = ['Invalid Password', 'Login Failure'];

export function classifyLogin(output: string): LoginOutcome {
  if (output.includes(READY_MARKER)) {
    return { kind: 'success' };
  }
  if (CHALLENGE_MARKERS.some((marker) => output.includes(marker))) {
    return { kind: 'authChallengeRequired' };
  }
  if (INVALID_MARKERS.some((marker) => output.includes(marker))) {
    return { kind: 'invalidCredentials' };
  }
  return { kind: 'unclassified', output: output.trim() };
}

const SIZE_PATTERNS = [/"SizeOnDisk"\s+"(\d+)"/, /"size"\s+"(\d+)"/];

/**
 * Size in bytes from an app-info dump, or undefined when absent
 */
export function parseContentSize(output: string): number | undefined {
  for (const pattern of SIZE_PATTERNS) {
    const match = pattern.exec(output);
    if (match) {
      return parseInt(match[1], 10);
    }
  }
  return undefined;
}
