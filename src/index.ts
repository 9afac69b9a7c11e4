/**
 * run-notifier public API.
 *
 * Typical use:
 *
 *   const config = loadRunConfig('config.json');
 *   await runTask('nightly import', async (events) => {
 *     events.info('JSON read');
 *   }, { emailConfig: config.email, notification: config.notifications, mattermost: config.mattermost });
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
