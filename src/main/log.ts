import log from 'electron-log/node';

const isTestRun = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;

log.transports.file.level = isTestRun ? false : 'info';

export default log;
