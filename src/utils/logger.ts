// Console-backed logger. Call sites prefix messages with "[Component]".
const logger = {
  info: console.log,
  warn: console.warn,
  error: console.error,
};

export default logger;
