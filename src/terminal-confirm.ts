import type { Interface } from "readline";

import { ConfirmChannel, parseConfirmAnswer, type ConfirmRequest } from "./confirm-channel";

/**
 * Confirm channel answered by typing on a readline interface. When the
 * interface closes (end of input, or rl.close()) the channel is cancelled,
 * so a pending prompt and every later one resolve as a decline.
 */
export function createTerminalConfirmChannel(
  rl: Interface,
  describe: (request: ConfirmRequest) => string,
): ConfirmChannel {
  const channel = new ConfirmChannel((request) => {
    console.log(`\n${describe(request)}`);
    rl.question("Continue? [y/N] ", (answer) => {
      channel.respond(parseConfirmAnswer(answer));
    });
  });
  rl.on("close", () => channel.cancel());
  return channel;
}
