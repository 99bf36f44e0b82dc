#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { formatDetectionSet, formatOverlay } from './components/DetectionReport';
import { AppConfig, ConfigOverrides, endpointsFor, loadConfig, parseCanvas } from './config';
import { describeError } from './errors';
import { DebugLogger } from './services/DebugLogger';
import { DetectionSession } from './services/DetectionSession';
import { mapDetections } from './services/DisplayMapper';
import { ModelService } from './services/ModelService';
import { DRIVE_DIRECTIONS, isDriveDirection, RoverApiClient } from './services/RoverApiClient';

const USAGE = `Usage:
  rover-vision [stream] --host <ip> [options]
  rover-vision drive <${DRIVE_DIRECTIONS.join('|')}> --host <ip> [--port <port>]

Options:
  --host <ip>          rover server address (env ROVER_HOST)
  --port <port>        rover server port, default 5000 (env ROVER_PORT)
  --model <path>       ONNX detection model (env ROVER_MODEL_PATH)
  --labels <path>      class label file, one label per line (env ROVER_LABELS_PATH)
  --threshold <0..1>   detection confidence threshold, default 0.45
  --canvas <WxH>       display surface to map detections onto, e.g. 640x480
  --no-detect          stream without running detection
  --remote-log <url>   also POST every log entry to this endpoint
  --help               show this message`;

export function parseCli(argv: string[]): { command: string; positionals: string[]; overrides: ConfigOverrides; help: boolean } {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      host: { type: 'string', short: 'h' },
      port: { type: 'string', short: 'p' },
      model: { type: 'string' },
      labels: { type: 'string' },
      threshold: { type: 'string' },
      canvas: { type: 'string' },
      'no-detect': { type: 'boolean' },
      'remote-log': { type: 'string' },
      help: { type: 'boolean' },
    },
  });

  const [command = 'stream', ...rest] = positionals;
  const overrides: ConfigOverrides = {
    host: values.host,
    port: values.port === undefined ? undefined : Number(values.port),
    modelPath: values.model,
    labelsPath: values.labels,
    confidenceThreshold: values.threshold === undefined ? undefined : Number(values.threshold),
    canvas: values.canvas === undefined ? undefined : parseCanvas(values.canvas),
    detectionEnabled: values['no-detect'] ? false : undefined,
    remoteLogUrl: values['remote-log'],
  };
  return { command, positionals: rest, overrides, help: values.help ?? false };
}

async function runDrive(config: AppConfig, logger: DebugLogger, direction: string | undefined): Promise<number> {
  if (!direction || !isDriveDirection(direction)) {
    logger.error(`Unknown drive direction "${direction ?? ''}". Expected one of: ${DRIVE_DIRECTIONS.join(', ')}`);
    return 2;
  }
  const endpoints = endpointsFor(config);
  const client = new RoverApiClient({
    statusUrl: endpoints.status,
    controlBaseUrl: endpoints.control,
    statusTimeoutMs: config.statusTimeoutMs,
    controlTimeoutMs: config.controlTimeoutMs,
    logger,
  });
  return (await client.sendCommand(direction)) ? 0 : 1;
}

async function runStream(config: AppConfig, logger: DebugLogger): Promise<number> {
  const modelService = new ModelService({
    logger,
    config: {
      inputSize: config.detection.inputSize,
      confidenceThreshold: config.detection.confidenceThreshold,
      iouThreshold: config.detection.iouThreshold,
    },
  });

  if (config.detection.enabled) {
    try {
      await modelService.initialize(config.modelPath, config.labelsPath);
    } catch (error) {
      logger.error(`Detection disabled: ${describeError(error)}`);
    }
  }

  const session = new DetectionSession({
    config,
    modelService,
    logger,
    listeners: {
      onStatus: status => logger.info(`[${status.state}] ${status.message}`),
      onPerformance: sample => logger.info(sample.summary),
      onDetections: set => {
        formatDetectionSet(set).forEach(line => logger.detection(line));
        if (config.canvas) {
          mapDetections(set, config.canvas).forEach(instruction => logger.detection(`  -> ${formatOverlay(instruction)}`));
        }
      },
    },
  });
  if (config.detection.enabled && !modelService.isReady()) {
    session.setDetectionEnabled(false);
  }

  const stop = () => session.disconnect();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await session.connect();
    await session.closed();
  } catch (error) {
    logger.error(describeError(error));
    return 1;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    session.disconnect();
    await modelService.unload();
  }
  return session.getStatus().state === 'error' ? 1 : 0;
}

export async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  let config: AppConfig;
  try {
    parsed = parseCli(argv);
    if (parsed.help) {
      console.log(USAGE);
      return 0;
    }
    config = loadConfig(parsed.overrides);
  } catch (error) {
    console.error(describeError(error));
    console.error(USAGE);
    return 2;
  }

  const logger = new DebugLogger({ remoteUrl: config.remoteLogUrl });
  switch (parsed.command) {
    case 'stream':
      return runStream(config, logger);
    case 'drive':
      return runDrive(config, logger, parsed.positionals[0]);
    default:
      console.error(`Unknown command "${parsed.command}"`);
      console.error(USAGE);
      return 2;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    },
  );
}
