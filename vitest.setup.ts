import { configureLogging, LogLevel } from "@karya/core";

// Runtime components log through the global defaults; keep test output quiet
// unless a test installs its own transport.
configureLogging({ level: LogLevel.ERROR, transports: [] });
