export default () => ({
  app: {
    name: process.env.APP_NAME || 'reminder-api',
    port: parseInt(process.env.PORT || '5000', 10),
  },

  mongo: {
    uri: process.env.MONGO_URI || 'mongodb://localhost:27017',
    database: process.env.DB_NAME || 'reminders',
    remindersCollection: process.env.REMINDERS_COLLECTION || 'reminders',
  },

  llm: {
    apiKey: process.env.TOGETHER_API_KEY,
    baseUrl: process.env.LLM_BASE_URL || 'https://api.together.xyz/v1',
    model: process.env.LLM_MODEL || 'deepseek-ai/DeepSeek-V3',
    // per-call timeout in ms; the client never retries
    timeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || '60000', 10),
  },
});
