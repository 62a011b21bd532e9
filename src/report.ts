import chalk from 'chalk';
import type { RunSummary, Violation } from './types.js';

export function formatViolation(violation: Violation): string {
  return `[${violation.type}] ${violation.message}`;
}

/**
 * Violation count for one release. With `fixed`, shows the count before and
 * after fixing. Clean counts are green; a count left unchanged is red.
 */
export function formatViolationCounts(old: number, fixed?: number): string {
  const before = old === 0 ? chalk.green('0') : chalk.red(String(old));

  if (fixed === undefined) {
    return before;
  }

  let after: string;

  if (fixed === 0) {
    after = chalk.green('0');
  } else if (fixed === old) {
    after = chalk.red(String(fixed));
  } else {
    after = chalk.yellow(String(fixed));
  }

  return `${before} -> ${after}`;
}

export function printViolations(violations: Violation[]): void {
  for (const violation of violations) {
    console.log(chalk.gray(`  ${formatViolation(violation)}`));
  }
}

/** One line per validated release: `<count> violations: <path>`. */
export function printValidation(path: string, violations: Violation[], showViolations: boolean): void {
  console.log(`${formatViolationCounts(violations.length)} violations: ${path}`);

  if (showViolations) {
    printViolations(violations);
  }
}

/** One line per fixed release: `<before> -> <after> violations: <path>`. */
export function printFix(
  path: string,
  oldViolations: Violation[],
  violations: Violation[],
  showViolations: boolean
): void {
  console.log(`${formatViolationCounts(oldViolations.length, violations.length)} violations: ${path}`);

  if (!showViolations) {
    return;
  }

  if (oldViolations.length > 0) {
    console.log('Before:');
    printViolations(oldViolations);
  }

  if (violations.length > 0) {
    console.log('After:');
    printViolations(violations);
  }
}

export function listReleases(releaseDirs: string[]): number {
  console.log(chalk.cyan('Found release directories:'));

  for (const dir of releaseDirs) {
    console.log(dir);
  }

  console.log(`Total: ${releaseDirs.length}`);

  return releaseDirs.length;
}

export function printSummary(summary: RunSummary): void {
  console.log('');
  console.log(chalk.cyan('Summary'));
  console.log(chalk.gray(`  Releases: ${summary.releases}`));
  console.log(chalk.gray(`  Violations: ${summary.violations}`));

  if (summary.skipped > 0) {
    console.log(chalk.yellow(`  Skipped: ${summary.skipped}`));
  }
}
