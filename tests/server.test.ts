import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { ContentCache } from '../src/cache.js';
import type { ExtractedContent } from '../src/extract.js';
import type { PageMetadata } from '../src/metadata.js';
import { createMcpServer } from '../src/server.js';
import { createToolServices } from '../src/tools.js';

describe('MCP server', () => {
  let server: McpServer;
  let client: Client;

  before(async () => {
    server = createMcpServer(
      createToolServices({
        fetchRaw: (url) =>
          Promise.resolve({
            bytes: new TextEncoder().encode('<h1>Hi</h1>'),
            contentType: 'text/html',
            url,
          }),
        cache: new ContentCache<ExtractedContent>({ enabled: false }),
        metadataCache: new ContentCache<PageMetadata>({ enabled: false }),
      })
    );
    client = new Client({ name: 'test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  after(async () => {
    await client.close();
    await server.close();
  });

  it('lists every tool', async () => {
    const { tools } = await client.listTools();
    assert.deepEqual(tools.map((tool) => tool.name).sort(), [
      'fetch-url',
      'url-fetch',
      'url-metadata',
    ]);
  });

  it('runs url-metadata end to end', async () => {
    const result = await client.callTool({
      name: 'url-metadata',
      arguments: { url: 'https://example.com/' },
    });
    assert.deepEqual(result.structuredContent, {
      url: 'https://example.com/',
      title: '',
      description: '',
      favicon: 'https://example.com/favicon.ico',
    });
  });

  it('runs url-fetch end to end', async () => {
    const result = await client.callTool({
      name: 'url-fetch',
      arguments: { url: 'https://example.com/' },
    });
    assert.deepEqual(result.content, [{ type: 'text', text: '# Hi' }]);
  });

  it('applies fetch-url defaults', async () => {
    const result = await client.callTool({
      name: 'fetch-url',
      arguments: { url: 'https://example.com/' },
    });
    assert.deepEqual(result.structuredContent, {
      url: 'https://example.com/',
      kind: 'html-full',
      contentType: 'text/html',
      mainFragmentUsed: false,
      contentLength: 4,
      truncated: false,
      content: '# Hi',
    });
  });
});
