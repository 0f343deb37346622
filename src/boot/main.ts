/**
 * Terminal entry point
 * Wires the application, prints operator events and reads commands from stdin
 */

import 'dotenv/config';

import { dirname } from 'node:path';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';

import type { ParameterRequestEvent } from '@events';
import { errorMessage } from '@utils/error';

import { loadConfig } from './config';
import { activePrompt, formatStatus, HELP_TEXT, parseCommand, resolvePromptInput } from './helpers';
import { initialize } from './init';

const app = await initialize(loadConfig(process.env), {
  baseDir: dirname(fileURLToPath(import.meta.url)),
  consoleApi: console,
});

if (app === null) {
  process.exitCode = 1;
} else {
  const { config, logger, channel, controls, engine, gate, poller, store } = app;
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let prompt: ParameterRequestEvent | null = null;

  channel.subscribe('log_line', (event) => {
    console.log(event.line);
  });
  channel.subscribe('alert', (event) => {
    console.log('\n*** ' + event.message.replace(/\n/g, '\n*** ') + '\n');
  });
  channel.subscribe('device_info', (event) => {
    if (event.info !== null) {
      console.log('Device: ' + event.info.name + ' | Serial: ' + event.info.serialNumber +
        ' | Firmware: ' + event.info.firmwareVersion);
    } else {
      console.log('Device: not connected');
    }
  });
  channel.subscribe('parameter_request', (event) => {
    prompt = event;
    const offered = event.defaultValue === '' ? '' : ' [' + event.defaultValue + ']';
    rl.setPrompt(event.prompt + offered + ' ');
    rl.prompt();
  });
  channel.subscribe('run_state', (event) => {
    logger.debug('Run state: ' + event.state);
    if (event.previous === 'awaiting_config' && prompt !== null) {
      prompt = null;
      rl.setPrompt('> ');
      rl.prompt();
    }
  });

  function watchRun(run: ReturnType<typeof controls.toggleRun>): void {
    if (run === null) return;
    run.then(
      (outcome) => {
        if (outcome !== null) {
          logger.info('Run ' + outcome.state + ' after ' + outcome.stepsExecuted + ' step(s)');
        }
      },
      (err: unknown) => {
        logger.critical('Run failed: ' + errorMessage(err));
      }
    );
  }

  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    rl.close();
    await controls.shutdown();
    // a sequence wait may still hold a timer
    process.exit(0);
  }

  function requestShutdown(reason: string): void {
    logger.info(reason);
    shutdown().catch((err: unknown) => {
      logger.critical('Shutdown failed: ' + errorMessage(err));
      process.exit(1);
    });
  }

  async function handleLine(line: string): Promise<void> {
    const pending = activePrompt(prompt, gate.pending());
    prompt = null;
    rl.setPrompt('> ');
    if (pending !== null) {
      const answer = resolvePromptInput(line, pending.defaultValue);
      if (answer === null) {
        controls.cancelParameter(pending.kind);
      } else {
        controls.answerParameter(pending.kind, answer);
      }
      return;
    }

    const command = parseCommand(line);
    switch (command.kind) {
      case 'run':
        watchRun(controls.toggleRun());
        break;
      case 'stop':
        if (engine.isRunning()) {
          controls.toggleRun();
        }
        break;
      case 'valve':
        await controls.toggleValve(command.port);
        break;
      case 'connect':
        await controls.connect();
        break;
      case 'disconnect':
        await controls.disconnect();
        break;
      case 'status':
        console.log(formatStatus(store.getSnapshot(), config.UNAVAILABLE_MARKER));
        break;
      case 'help':
        console.log(HELP_TEXT);
        break;
      case 'quit':
        requestShutdown('Quit requested');
        return;
      case 'unknown':
        if (command.text !== '') {
          console.log('Unknown command "' + command.text + '" (type help)');
        }
        break;
    }
    rl.prompt();
  }

  rl.on('line', (line) => {
    handleLine(line).catch((err: unknown) => {
      logger.critical('Command failed: ' + errorMessage(err));
    });
  });

  rl.on('close', () => {
    requestShutdown('Input closed');
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      requestShutdown('Received ' + signal);
    });
  }

  await controls.connect();
  poller.start();
  console.log(HELP_TEXT);
  rl.setPrompt('> ');
  rl.prompt();
}
