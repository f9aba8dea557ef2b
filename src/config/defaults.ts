import os from 'os';
import type { GuideCheckConfig } from './schema.js';

/** Built-in configuration; a config file only needs the keys it overrides. */
export const DEFAULT_CONFIG: GuideCheckConfig = {
  image: 'ubuntu:focal',
  mode: 'full',
  execute: false,
  timeout_seconds: 3600,
  artifacts_dir: os.tmpdir(),
  markers: {
    container_tag: 'div',
    block_class: 'code-block',
    control_tag: 'button',
    control_class: 'copy-button',
  },
  product: {
    name: 'example-daemon',
    executable: 'example-daemon',
    version_flag: '--version',
  },
  prerequisites: ['ca-certificates', 'curl', 'gnupg', 'sudo', 'wget'],
  informational_commands: [
    {
      id: 'lsb-release-query',
      pattern: String.raw`^(?:sudo\s+)?lsb_release(?:\s+-\w+)*\s*$`,
      message: 'Distribution name query shown for reference only',
    },
    {
      id: 'os-release-query',
      pattern: String.raw`^cat\s+/etc/os-release\s*$`,
      message: 'OS release query shown for reference only',
    },
    {
      id: 'uname-query',
      pattern: String.raw`^uname(?:\s+-\w+)*\s*$`,
      message: 'Kernel query shown for reference only',
    },
  ],
  required_patterns: [
    {
      id: 'trusted-keyring',
      pattern: String.raw`/etc/apt/trusted\.gpg\.d|/usr/share/keyrings|/etc/apt/keyrings|\bapt-key\s+add\b`,
      message: 'No command adds a trusted keyring',
    },
    {
      id: 'signing-key-import',
      pattern: String.raw`\bgpg\b.*(?:--import|--dearmou?r|--recv-keys?)|\bapt-key\s+(?:add|adv)\b`,
      message: 'No command fetches and imports a signing key',
    },
    {
      id: 'package-source',
      pattern: String.raw`/etc/apt/sources\.list|\badd-apt-repository\b`,
      message: 'No command registers a package source',
    },
    {
      id: 'package-install',
      pattern: String.raw`\bapt(?:-get)?\s+(?:-\S+\s+)*install\b`,
      message: 'No command installs packages via the system package manager',
    },
  ],
  danger_patterns: [
    {
      id: 'recursive-force-remove',
      pattern: String.raw`\brm\s+(?:-{1,2}[\w-]+\s+)*(?:-[a-zA-Z]*(?:[rR][a-zA-Z]*f|f[a-zA-Z]*[rR])[a-zA-Z]*\b|(?:-[rR]|--recursive)\s+(?:-{1,2}[\w-]+\s+)*(?:-f|--force)\b|(?:-f|--force)\s+(?:-{1,2}[\w-]+\s+)*(?:-[rR]|--recursive)\b)`,
      message: 'Recursive forced removal',
    },
  ],
  key_verification: {
    expected_fingerprint: null,
    key_file: null,
  },
  codename_images: {
    bullseye: 'debian:bullseye',
    bookworm: 'debian:bookworm',
    focal: 'ubuntu:20.04',
    jammy: 'ubuntu:22.04',
    noble: 'ubuntu:24.04',
  },
};
