import { AddressState } from './image/address-state.js';
import type { AddressWindow } from './image/address-window.js';
import { SparseByteMap } from './image/sparse-byte-map.js';
import {
  decodeRecord,
  extendedAddressOf,
  RecordType,
  type DecodeOptions,
} from './intelhex/record.js';
import { hex } from './utils/bit.js';
import { ConsoleLogger, LogLevel, type Logger } from './utils/logging.js';

const LOG_NAME = 'HexLoader';

export interface LoadStats {
  lines: number;
  records: number;
  failures: number;
  /** True once an End-Of-File record was seen */
  terminated: boolean;
}

/**
 * Feeds Intel HEX lines into a {@link SparseByteMap}, keeping track of the
 * extended linear address between lines.
 */
export class HexLoader {
  readonly addressState = new AddressState();
  readonly map: SparseByteMap;
  readonly stats: LoadStats = { lines: 0, records: 0, failures: 0, terminated: false };

  public logger: Logger = new ConsoleLogger(LogLevel.Info);

  constructor(
    window: AddressWindow,
    private readonly options: DecodeOptions = {},
  ) {
    this.map = new SparseByteMap(window);
  }

  /** Processes one line. Returns false once the End-Of-File record was read. */
  loadLine(line: string) {
    if (this.stats.terminated) {
      return false;
    }
    this.stats.lines++;

    const result = decodeRecord(line, this.options);
    if (!result.ok) {
      const { failure } = result;
      this.stats.failures++;
      this.logger.warn(
        LOG_NAME,
        `Could not parse line '${failure.line}'. Reason: ${failure.reason}`,
      );
      return true;
    }

    const { record } = result;
    if (!record) {
      return true;
    }
    this.stats.records++;

    switch (record.recordType) {
      case RecordType.Data: {
        const base = this.addressState.resolve(record.addressOffset);
        let stored = 0;
        for (let i = 0; i < record.byteCount; i++) {
          if (this.map.set(base + i, record.data[i])) {
            stored++;
          }
        }
        this.logger.debug(
          LOG_NAME,
          `Data at 0x${hex(base, 8)}: ${stored}/${record.byteCount} bytes in range`,
        );
        break;
      }

      case RecordType.ExtendedLinearAddress:
        this.addressState.onExtendedAddress(extendedAddressOf(record));
        this.logger.debug(LOG_NAME, `Base address 0x${hex(this.addressState.base, 8)}`);
        break;

      case RecordType.EndOfFile:
        this.stats.terminated = true;
        return false;

      case RecordType.Other:
        this.logger.debug(LOG_NAME, `Ignoring record type 0x${hex(record.typeCode, 2)}`);
        break;
    }
    return true;
  }

  loadSource(source: string) {
    for (const line of source.split('\n')) {
      if (!this.loadLine(line)) {
        break;
      }
    }
    return this.map;
  }
}
