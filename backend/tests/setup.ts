// Keep grading runs quiet in tests; individual tests pass their own logger when they assert on logs.
process.env.LOG_LEVEL = "silent";
process.env.NODE_ENV = "test";
