import { readFileSync, writeFileSync } from 'fs';
import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { XMLValidator } from 'fast-xml-parser';
import type { ServerCredential } from '../schemas/index.js';

const SERVER_FIELDS = ['id', 'username', 'password'] as const;

/**
 * In-memory Maven settings file. Mutations only ever append; everything
 * already in the source document is serialized back unchanged.
 */
export class SettingsDocument {
  private constructor(private readonly doc: Document) {}

  static parse(xml: string): SettingsDocument {
    // xmldom recovers from some malformed input; reject it before building the DOM
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new Error(`Malformed settings XML: ${msg} (line ${line}, col ${col})`);
    }

    const fail = (msg: string) => {
      throw new Error(`Malformed settings XML: ${msg}`);
    };
    const parser = new DOMParser({
      errorHandler: { warning: fail, error: fail, fatalError: fail },
    });
    return new SettingsDocument(parser.parseFromString(xml, 'text/xml'));
  }

  static load(path: string): SettingsDocument {
    return SettingsDocument.parse(readFileSync(path, 'utf-8'));
  }

  getSettings(): Element {
    const settings = this.doc.getElementsByTagName('settings').item(0);
    if (!settings) {
      throw new Error('No <settings> element found in settings XML');
    }
    return settings;
  }

  ensureServers(): Element {
    const settings = this.getSettings();
    const existing = settings.getElementsByTagName('servers').item(0);
    if (existing) {
      return existing;
    }

    const servers = this.doc.createElement('servers');
    settings.appendChild(servers);
    return servers;
  }

  appendServer(credential: ServerCredential): Element {
    const server = this.doc.createElement('server');
    for (const field of SERVER_FIELDS) {
      const child = this.doc.createElement(field);
      child.appendChild(this.doc.createTextNode(credential[field]));
      server.appendChild(child);
    }

    this.ensureServers().appendChild(server);
    return server;
  }

  listServers(): ServerCredential[] {
    const servers = this.getSettings().getElementsByTagName('servers').item(0);
    if (!servers) {
      return [];
    }

    const entries: ServerCredential[] = [];
    for (let i = 0; i < servers.childNodes.length; i++) {
      const node = servers.childNodes.item(i);
      if (node.nodeName !== 'server') {
        continue;
      }
      entries.push({
        id: childText(node, 'id'),
        username: childText(node, 'username'),
        password: childText(node, 'password'),
      });
    }
    return entries;
  }

  toXml(): string {
    return new XMLSerializer().serializeToString(this.doc);
  }

  save(path: string): void {
    writeFileSync(path, this.toXml(), 'utf-8');
  }
}

function childText(server: Node, name: string): string {
  for (let i = 0; i < server.childNodes.length; i++) {
    const child = server.childNodes.item(i);
    if (child.nodeName === name) {
      return child.textContent ?? '';
    }
  }
  return '';
}
