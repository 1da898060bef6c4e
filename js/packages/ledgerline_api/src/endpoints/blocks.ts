import { array, field, int, nullable, record, str, type Decoder } from '../decoding/decoders';

/**
 * A block as returned by `/blocks/latest`, `/blocks/{hash_or_number}`, and the
 * `next`/`previous` listings.
 */
export interface Block {
  /** Block creation time in UNIX time */
  time: number;
  /** Block number */
  height: number | null;
  hash: string;
  slot: number | null;
  epoch: number | null;
  /** Slot within the epoch */
  epoch_slot: number | null;
  /** Bech32 ID of the slot leader, or a description when there is none */
  slot_leader: string;
  /** Block size in bytes */
  size: number;
  tx_count: number;
  /** Total output within the block in Lovelaces */
  output: string | null;
  /** Total fees within the block in Lovelaces */
  fees: string | null;
  /** VRF key of the block */
  block_vrf: string | null;
  previous_block: string | null;
  next_block: string | null;
  confirmations: number;
}

export interface TxHash {
  tx_hash: string;
}

export interface AffectedAddress {
  /** Bech32 encoded address */
  address: string;
  transactions: TxHash[];
}

export const decodeBlock: Decoder<Block> = (value, path) => {
  const source = record(value, path);
  return {
    time: field(source, 'time', int, path),
    height: field(source, 'height', nullable(int), path),
    hash: field(source, 'hash', str, path),
    slot: field(source, 'slot', nullable(int), path),
    epoch: field(source, 'epoch', nullable(int), path),
    epoch_slot: field(source, 'epoch_slot', nullable(int), path),
    slot_leader: field(source, 'slot_leader', str, path),
    size: field(source, 'size', int, path),
    tx_count: field(source, 'tx_count', int, path),
    output: field(source, 'output', nullable(str), path),
    fees: field(source, 'fees', nullable(str), path),
    block_vrf: field(source, 'block_vrf', nullable(str), path),
    previous_block: field(source, 'previous_block', nullable(str), path),
    next_block: field(source, 'next_block', nullable(str), path),
    confirmations: field(source, 'confirmations', int, path),
  };
};

export const decodeTxHash: Decoder<TxHash> = (value, path) => {
  const source = record(value, path);
  return { tx_hash: field(source, 'tx_hash', str, path) };
};

export const decodeAffectedAddress: Decoder<AffectedAddress> = (value, path) => {
  const source = record(value, path);
  return {
    address: field(source, 'address', str, path),
    transactions: field(source, 'transactions', array(decodeTxHash), path),
  };
};

export const BLOCK_PATHS = {
  latest: '/blocks/latest',
  latestTxs: '/blocks/latest/txs',
  byId: '/blocks/{hash_or_number}',
  bySlot: '/blocks/slot/{slot_number}',
  byEpochAndSlot: '/blocks/epoch/{epoch_number}/slot/{slot_number}',
  next: '/blocks/{hash_or_number}/next',
  previous: '/blocks/{hash_or_number}/previous',
  txs: '/blocks/{hash_or_number}/txs',
  addresses: '/blocks/{hash_or_number}/addresses',
} as const;
