/**
 * PowerTag Gateway Constants
 * Centralized definitions for magic numbers and protocol values
 */

// Unit IDs
export const GATEWAY_UNIT_ID = 255;             // PowerTag Link / Panel Server itself
export const MIN_UNIT_ID = 1;                   // Minimum valid Modbus unit ID
export const MAX_UNIT_ID = 247;                 // Maximum valid Modbus unit ID
export const SYNTHESIS_UNIT_ID_START = 247;     // First synthesis table candidate
export const SYNTHESIS_UNIT_ID_END = 2;         // Last synthesis table candidate

// Synthesis table probe
export const SYNTHESIS_PROBE_ADDRESS = 0x0001;  // Product ID register

// Not Available Sentinels
export const UINT16_NOT_AVAILABLE = 0xFFFF;
export const UINT32_NOT_AVAILABLE = 0x80000000;
export const UINT64_NOT_AVAILABLE = 0x8000000000000000n;

// Register Size Multipliers
export const REG_SIZE_16 = 1;                   // 16-bit register = 1 register
export const REG_SIZE_32 = 2;                   // 32-bit register = 2 registers
export const REG_SIZE_64 = 4;                   // 64-bit register = 4 registers
export const REG_SIZE_DATETIME = 4;             // Packed date-time = 4 registers
export const MAX_REGISTER_VALUE = 0xFFFF;

// Packed date-time
export const DATETIME_YEAR_BASE = 2000;

// Wireless node table
export const NODE_SLOT_COUNT = 100;

// Writable commands
export const RESET_PEAK_DEMANDS_COMMAND = 1;

// Default Timeouts (ms)
export const DEFAULT_TIMEOUT = 5000;            // Standard Modbus timeout
export const CONNECTION_TIMEOUT = 5000;         // TCP connection timeout

// Default Ports
export const DEFAULT_MODBUS_PORT = 502;         // Standard Modbus TCP port

// Retry Configuration
export const MIN_PACING_INTERVAL = 1;           // Minimum auto-read interval (seconds)
export const MAX_RETRY_DELAY = 60000;           // Maximum retry backoff (ms)
export const BASE_RETRY_DELAY = 1000;           // Initial retry delay (ms)
