import type { AutomatonDefinition } from '../types';

/**
 * Simplified TCP three-way handshake.
 * Server side: CLOSED -LISTEN-> LISTEN -SYN-> SYN_RECEIVED -ACK-> ESTABLISHED
 * Client side: CLOSED -SYN-> SYN_SENT -SYN_ACK-> ESTABLISHED
 */
export const TCP_HANDSHAKE_DEFINITION: AutomatonDefinition = {
  name: 'tcp-handshake',
  description: 'TCP three-way handshake (server and client side)',
  start_state: 'CLOSED',
  accepting_states: ['ESTABLISHED'],
  transitions: [
    { from: 'CLOSED', symbol: 'LISTEN', to: 'LISTEN' },
    { from: 'LISTEN', symbol: 'SYN', to: 'SYN_RECEIVED' },
    { from: 'SYN_RECEIVED', symbol: 'ACK', to: 'ESTABLISHED' },
    { from: 'CLOSED', symbol: 'SYN', to: 'SYN_SENT' },
    { from: 'SYN_SENT', symbol: 'SYN_ACK', to: 'ESTABLISHED' },
  ],
  paths: [
    {
      name: 'server-side handshake',
      description: 'Passive open: listen, receive SYN, receive ACK',
      symbols: ['LISTEN', 'SYN', 'ACK'],
    },
    {
      name: 'client-side handshake',
      description: 'Active open: send SYN, receive SYN_ACK',
      symbols: ['SYN', 'SYN_ACK'],
    },
  ],
};

export interface ExampleSequence {
  name: string;
  packets: string[];
  description: string;
  expected: 'valid' | 'invalid';
}

export const EXAMPLE_SEQUENCES: readonly ExampleSequence[] = [
  {
    name: 'Valid TCP Handshake (Server)',
    packets: ['LISTEN', 'SYN', 'ACK'],
    description: 'Server-side TCP 3-way handshake',
    expected: 'valid',
  },
  {
    name: 'Valid TCP Handshake (Client)',
    packets: ['SYN', 'SYN_ACK'],
    description: 'Client-side TCP handshake',
    expected: 'valid',
  },
  {
    name: 'Missing SYN',
    packets: ['LISTEN', 'ACK'],
    description: 'Skips SYN packet - invalid',
    expected: 'invalid',
  },
  {
    name: 'Wrong Order',
    packets: ['ACK', 'SYN', 'LISTEN'],
    description: 'Packets in wrong order',
    expected: 'invalid',
  },
  {
    name: 'Invalid Input',
    packets: ['LISTEN', 'INVALID', 'SYN'],
    description: 'Contains invalid packet type',
    expected: 'invalid',
  },
];
