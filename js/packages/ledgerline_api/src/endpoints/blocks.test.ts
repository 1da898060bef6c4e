import { array, SchemaError } from '../decoding/decoders';
import { type AffectedAddress, type Block, decodeAffectedAddress, decodeBlock } from './blocks';
import { decodeApiRoot, decodeHealthClock } from './health';

const FULL_BLOCK: Block = {
  time: 1700000000,
  height: 15243593,
  hash: 'test-block-hash',
  slot: 412162133,
  epoch: 425,
  epoch_slot: 12,
  slot_leader: 'pool-test-leader',
  size: 3,
  tx_count: 1,
  output: '128314491794',
  fees: '592661',
  block_vrf: 'vrf-test-key',
  previous_block: 'test-previous-hash',
  next_block: 'test-next-hash',
  confirmations: 4698,
};

const BARE_BLOCK: Block = {
  time: 1506203091,
  height: null,
  hash: 'test-genesis-hash',
  slot: null,
  epoch: null,
  epoch_slot: null,
  slot_leader: 'Genesis slot leader',
  size: 0,
  tx_count: 0,
  output: null,
  fees: null,
  block_vrf: null,
  previous_block: null,
  next_block: null,
  confirmations: 0,
};

describe('block decoders', () => {
  it.each([
    ['every field set', FULL_BLOCK],
    ['every optional field absent', BARE_BLOCK],
  ])('round-trips a block with %s', (_label, block) => {
    expect(decodeBlock(JSON.parse(JSON.stringify(block)))).toEqual(block);
  });

  it('reads missing optional fields as null', () => {
    const decoded = decodeBlock({
      time: 1,
      hash: 'h',
      slot_leader: 'leader',
      size: 1,
      tx_count: 0,
      confirmations: 0,
    });

    expect(decoded.height).toBeNull();
    expect(decoded.next_block).toBeNull();
  });

  it('drops fields the record does not declare', () => {
    expect(decodeBlock({ ...FULL_BLOCK, op_cert: 'x' })).toEqual(FULL_BLOCK);
  });

  it('rejects a missing required field with its path', () => {
    const { hash: _hash, ...withoutHash } = FULL_BLOCK;

    expect(() => decodeBlock(withoutHash)).toThrow(
      new SchemaError('$.hash', 'string', undefined)
    );
  });

  it('rejects a fractional integer', () => {
    expect(() => decodeBlock({ ...FULL_BLOCK, size: 1.5 })).toThrow('$.size: expected integer, got number');
  });

  it('reports paths inside nested arrays', () => {
    const page = [
      { address: 'addr_test1', transactions: [{ tx_hash: 'a' }] },
      { address: 'addr_test2', transactions: [{ tx_hash: 'b' }, { tx_hash: 7 }] },
    ];

    expect(() => array(decodeAffectedAddress)(page)).toThrow(
      '$[1].transactions[1].tx_hash: expected string, got number'
    );
  });

  it('round-trips affected addresses', () => {
    const address: AffectedAddress = {
      address: 'addr_test1',
      transactions: [{ tx_hash: 'a' }, { tx_hash: 'b' }],
    };

    expect(decodeAffectedAddress(JSON.parse(JSON.stringify(address)))).toEqual(address);
  });
});

describe('health decoders', () => {
  it('decodes the API root', () => {
    expect(decodeApiRoot({ url: 'https://docs.test/', version: '0.1.0' })).toEqual({
      url: 'https://docs.test/',
      version: '0.1.0',
    });
  });

  it('rejects a non-object', () => {
    expect(() => decodeHealthClock([])).toThrow('$: expected object, got array');
  });
});
