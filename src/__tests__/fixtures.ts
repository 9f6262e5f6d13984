import type { FileSystem } from '../filesystem';
import type { Checklist } from '../types';

/** In-memory project tree. Entries set to an Error throw on read. */
export class MemoryFileSystem implements FileSystem {
  reads: string[] = [];

  constructor(private files: Record<string, string | Error> = {}) {}

  exists(relPath: string): boolean {
    return Object.hasOwn(this.files, relPath);
  }

  readText(relPath: string): string {
    this.reads.push(relPath);
    const entry = this.files[relPath];
    if (entry === undefined) throw new Error(`ENOENT: ${relPath}`);
    if (entry instanceof Error) throw entry;
    return entry;
  }

  set(relPath: string, content: string | Error) {
    this.files[relPath] = content;
  }

  remove(relPath: string) {
    delete this.files[relPath];
  }
}

/** A project tree that satisfies every bundled check. */
export function migratedProject(): Record<string, string> {
  return {
    'Cargo.toml': [
      '[package]',
      'name = "crosscopy"',
      '',
      '[dependencies]',
      'libp2p = { version = "0.53", features = ["tcp", "mdns", "noise", "yamux"] }',
      'futures = "0.3"',
    ].join('\n'),
    'src/config/mod.rs': [
      'pub struct NetworkConfig {',
      '    pub enable_mdns: bool,',
      '    pub mdns_discovery_interval: u64,',
      '    pub enable_quic: bool,',
      '    pub idle_connection_timeout: u64,',
      '}',
    ].join('\n'),
    'src/network/mod.rs': [
      'pub enum NetworkError {',
      '    MdnsDiscoveryFailed(String),',
      '    Libp2p(String),',
      '    PeerNotFound(String),',
      '    Transport(String),',
      '}',
    ].join('\n'),
    'src/network/connection.rs': [
      'use libp2p::{PeerId, Multiaddr};',
      'pub struct Connection {',
      '    pub peer_id: Option<PeerId>,',
      '    pub address: Option<Multiaddr>,',
      '    pub message_sender: Option<mpsc::UnboundedSender<Message>>,',
      '}',
    ].join('\n'),
    'src/network/manager.rs': [
      'use libp2p::{mdns, swarm::SwarmEvent};',
      'struct CrossCopyBehaviour;',
      'match event {',
      '    SwarmEvent::Behaviour(Event::Mdns(mdns::Event::Discovered(list))) => {}',
      '}',
    ].join('\n'),
    'doc/technical-specification.md': '## libp2p 协议栈\n\n### mDNS 发现\n',
    'doc/api-reference.md': '```rust\nenable_mdns: bool,\nmdns_discovery_interval: u64,\n```\n',
    'doc/architecture.md': '- libp2p 点对点网络通信\n- mDNS 自动节点发现\n',
    'tests/network_libp2p_test.rs': '#[test]\nfn discovers_peers() {}\n',
    'examples/libp2p_network_demo.rs': 'fn main() {}\n',
    'NETWORK_MIGRATION.md': '# Network migration\n',
  };
}

/** Small two-section checklist for runner tests. */
export function tinyChecklist(): Checklist {
  return {
    id: 'tiny',
    title: 'Tiny check',
    marker: 'MARKER',
    markerMissingMessage: 'run from the project root',
    successMessage: 'all good',
    confirmations: ['a', 'b'],
    nextSteps: ['do x', 'do y'],
    failureMessage: 'something failed',
    sections: [
      {
        order: 1,
        title: 'Content',
        filePath: 'sections/01.md',
        checks: [
          {
            kind: 'content',
            path: 'a.txt',
            description: 'File A',
            requirements: [
              { pattern: /^alpha$/m, description: 'alpha line' },
              { pattern: /beta/m, description: 'beta anywhere' },
            ],
          },
        ],
      },
      {
        order: 2,
        title: 'Existence',
        filePath: 'sections/02.md',
        checks: [{ kind: 'exists', path: 'b.txt', description: 'File B' }],
      },
    ],
  };
}
