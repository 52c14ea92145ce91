/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import { readPackageVersion } from "../../utils/version";

export { color };

export const VERSION = readPackageVersion();

export const LOGO = String.raw`
     _                                          
 ___| |_ _____      ____ ___      ____ _ _   _ 
/ __| __/ _ \ \ /\ / / _' \ \ /\ / / _' | | | |
\__ \ || (_) \ V  V / (_| |\ V  V / (_| | |_| |
|___/\__\___/ \_/\_/ \__,_| \_/\_/ \__,_|\__, |
                                         |___/ 
`;

/**
 * Display the Stowaway banner with logo and version
 */
export function banner(command: string): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("Stowaway")} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
}

/**
 * Console output of the CLI. Run logs go through utils/logger instead.
 */
export const ui = {
  banner,
  outro: (message: string) => p.outro(color.green(message)),
  cancel: (message: string) => p.cancel(color.red(message)),
  note: (message: string, title?: string) => p.note(message, title),
  info: (message: string) => p.log.info(message),
  success: (message: string) => p.log.success(message),
  warn: (message: string) => p.log.warn(message),
  error: (message: string) => p.log.error(message),
  step: (message: string) => p.log.step(message),
  message: (message: string) => p.log.message(message),
};
