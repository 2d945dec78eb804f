import { fromRlp, hexToBigInt, isHex, type Hex } from 'viem';
import { InvalidSignalRecordError } from '../errors.js';

/**
 * Position of `baseFeePerGas` in an RLP-encoded block header (London and later):
 * parentHash, ommersHash, beneficiary, stateRoot, transactionsRoot,
 * receiptsRoot, logsBloom, difficulty, number, gasLimit, gasUsed, timestamp,
 * extraData, mixHash, nonce, baseFeePerGas, ...
 */
export const BASE_FEE_FIELD = 15;

function parseRlp(record: Hex) {
  try {
    return fromRlp(record, 'hex');
  } catch (error) {
    throw new InvalidSignalRecordError(
      'Signal record is not valid RLP',
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Extract the base fee from a raw block header.
 *
 * Later forks append fields after the base fee, so only a minimum length is
 * checked. An empty field decodes to 0.
 */
export function decodeBaseFee(record: Hex): bigint {
  if (!isHex(record, { strict: true })) {
    throw new InvalidSignalRecordError('Signal record is not a hex string');
  }

  const decoded = parseRlp(record);
  if (typeof decoded === 'string') {
    throw new InvalidSignalRecordError('Signal record is not an RLP list');
  }
  if (decoded.length <= BASE_FEE_FIELD) {
    throw new InvalidSignalRecordError(
      `Signal record has ${decoded.length} fields, base fee is field ${BASE_FEE_FIELD}`
    );
  }

  const field = decoded[BASE_FEE_FIELD];
  if (typeof field !== 'string') {
    throw new InvalidSignalRecordError('Base fee field is a list');
  }
  return field === '0x' ? 0n : hexToBigInt(field);
}
