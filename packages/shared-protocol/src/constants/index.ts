// Simulation clock
export const TICK_MS = 50; // Milliseconds per pulse (20 pulses per second)

// Event log
export const EVENT_LOG_BUFFER_SIZE = 4096;
