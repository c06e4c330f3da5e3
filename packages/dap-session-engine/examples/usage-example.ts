import * as path from 'path';
import {
  AdapterConfigLoader,
  Session,
  SessionData,
  createLogger,
  isSessionError,
} from '../src';

const logger = createLogger({ level: 'info', name: 'usage-example' });

async function main() {
  // Example 1: adapter from a config file
  console.log('\n=== Example 1: Using an adapter config file ===\n');

  const loader = new AdapterConfigLoader(logger);
  const adapterConfig = loader.loadAdapter(
    path.join(__dirname, 'adapters.json'),
    'python',
  );

  const session = await Session.fromAdapterConfig(adapterConfig, { logger });
  const data = new SessionData(logger);

  const initSeq = await session.sendInitRequest({
    clientID: 'usage-example',
    adapterID: adapterConfig.type,
    linesStartAt1: true,
    columnsStartAt1: true,
    pathFormat: 'path',
    supportsVariableType: true,
  });
  await session.waitForResponse(initSeq);
  session.handleInitResponse(initSeq);
  console.log(
    'Adapter capabilities:',
    session.adapterCapabilities.support.toArray().join(', '),
  );

  // Adapter-specific launch fields travel as extra arguments.
  const launchSeq = await session.sendLaunchRequest(
    { noDebug: false },
    { program: path.join(__dirname, 'app.py'), stopOnEntry: true },
  );
  await session.waitForEvent('initialized');
  session.handleNamedEvent('initialized');

  // Example 2: capability-gated request
  console.log('\n=== Example 2: configurationDone ===\n');
  try {
    const doneSeq = await session.sendConfigurationDoneRequest();
    await session.waitForResponse(doneSeq);
    session.handleConfigurationDoneResponse(doneSeq);
  } catch (error) {
    if (!isSessionError(error, 'AdapterDoesNotSupportConfigurationDone')) {
      throw error;
    }
    console.log('Adapter does not take configurationDone; skipping.');
  }

  await session.waitForResponse(launchSeq);
  session.handleLaunchResponse(launchSeq);
  console.log(`Session state: ${session.state}`);

  // Example 3: derived read cache
  console.log('\n=== Example 3: Threads snapshot ===\n');
  const threadsSeq = await session.sendThreadsRequest();
  await session.waitForResponse(threadsSeq);
  data.handleResponseThreads(session, threadsSeq);
  for (const thread of data.threads) {
    console.log(`Thread ${thread.id}: ${thread.name} (${thread.state.tag})`);
  }

  const disconnectSeq = await session.endSession('disconnect');
  await session.waitForResponse(disconnectSeq);
  session.handleDisconnectResponse(disconnectSeq);
  console.log('Session stats:', session.stats());

  const exit = await session.waitForAdapterExit();
  console.log(`Adapter exited with code ${exit.code}`);
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
