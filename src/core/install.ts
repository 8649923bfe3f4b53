// src/core/install.ts
// Install commands are only shown to the user; pkgscout never runs them.
import type { PackageRecord } from './types.js'

export function installCommand(record: PackageRecord, aurHelper = 'yay'): string {
  const name = record.name
  switch (record.source) {
    case 'pacman':
      return `sudo pacman -S ${name}`
    case 'aur':
      return `${aurHelper} -S ${name}`
    case 'flatpak':
      return `flatpak install flathub ${name}`
    case 'snap':
      return `sudo snap install ${name}`
    case 'apt':
      return `sudo apt install ${name}`
    case 'dnf':
      return `sudo dnf install ${name}`
  }
}
