process.env.DIALECT_RELAY_LOG_LEVEL = 'silent';
process.env.FORCE_COLOR = '0';
