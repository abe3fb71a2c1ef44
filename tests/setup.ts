/**
 * Jest Test Setup
 *
 * Global setup for all tests.
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.GEMINI_API_KEY;
delete process.env.LOCAL_CLASSIFIER_URL;
delete process.env.CIPHER_SECRET;

// Global test timeout
jest.setTimeout(10000);

// No test may reach the Gemini API
jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: jest.fn().mockImplementation(() => ({
    getGenerativeModel: jest.fn().mockReturnValue({
      generateContent: jest.fn().mockRejectedValue(new Error('Gemini API disabled in tests')),
    }),
  })),
}));

beforeEach(() => {
  jest.clearAllMocks();
});
