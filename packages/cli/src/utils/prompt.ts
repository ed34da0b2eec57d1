// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025-2026 Alexey Pelykh

import { createInterface } from "node:readline";
import { stderr, stdin } from "node:process";

/** Read one line from the terminal. The question goes to stderr so stdout stays clean. */
export async function promptInput(question: string): Promise<string> {
  const rl = createInterface({ input: stdin, output: stderr });
  const answer = await new Promise<string>((resolve) => {
    rl.question(question, (value) => {
      rl.close();
      resolve(value);
    });
  });
  return answer.trim();
}

/** Ask a yes/no question. Anything but `y` or `yes` is a no. */
export async function confirm(question: string): Promise<boolean> {
  const answer = await promptInput(`${question} [y/N] `);
  return /^y(es)?$/i.test(answer);
}

/** Whether both stdin and stderr are attached to a terminal. */
export function isInteractive(): boolean {
  return stdin.isTTY === true && stderr.isTTY === true;
}
