/**
 * Runs the API as a plain Node HTTP server (outside Cloud Functions).
 * With STORE_DRIVER=memory no Firebase credentials are needed.
 */
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import { createApp } from './app';
import { serverConfig, storeConfig } from './config';
import { initSentry } from './utils/sentry';

initSentry();

if (storeConfig.driver === 'firestore') {
  admin.initializeApp();
}

createApp().listen(serverConfig.port, () => {
  functions.logger.info(
    `[server] Listening on port ${serverConfig.port} (store: ${storeConfig.driver})`,
  );
});
