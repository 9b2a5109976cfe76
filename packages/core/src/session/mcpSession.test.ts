/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  connectToFakeServer,
  type FakeServerConnection,
} from '../test-utils/fakeMcpServer.js';
import {
  GREETING_TOOL,
  createGreetingServerOptions,
  greetingArgsSchema,
} from '../test-utils/fixtures.js';
import { UnknownResourceError, UnknownToolError } from '../utils/errors.js';

describe('McpSession', () => {
  let connection: FakeServerConnection | undefined;

  afterEach(async () => {
    await connection?.session.close();
    connection = undefined;
  });

  it('loads the tool and resource catalog on open', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());
    const { session } = connection;

    expect(session.tools.map((tool) => tool.name)).toEqual([
      GREETING_TOOL,
      'example:echo',
      'say hello',
    ]);
    expect(session.findTool(GREETING_TOOL)?.argsSchemaResource).toBe(
      'example:greetingJson:args:schema',
    );
    expect(session.resources.map((resource) => resource.name)).toEqual([
      'readme',
      'resource with spaces',
      'logo',
      'example:greetingJson:args:schema',
    ]);
    expect(session.serverName).toBe('fake-server');
  });

  it('reads argument schemas from the resource the tool names', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());
    const { session } = connection;

    expect(session.rawSchema(GREETING_TOOL)).toEqual(greetingArgsSchema);
    expect([...(session.schemas.get(GREETING_TOOL)?.properties.keys() ?? [])]).toEqual(
      ['name', 'include_details', 'preferences'],
    );
  });

  it('falls back to the advertised input schema', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());

    expect(connection.session.schemas.get('example:echo')?.required).toEqual([
      'text',
    ]);
  });

  it('builds a completion snapshot from the catalog', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());
    const snapshot = connection.session.snapshot(['help', 'call']);

    expect(snapshot.commands).toEqual(['help', 'call']);
    expect(snapshot.toolNames).toEqual([GREETING_TOOL, 'example:echo', 'say hello']);
    expect(snapshot.resourceNames).toContain('resource with spaces');
    expect(snapshot.lookupSchema(GREETING_TOOL)?.kind).toBe('object');
  });

  it('treats a server without resources as having none', async () => {
    const options = createGreetingServerOptions();
    delete options.resources;
    connection = await connectToFakeServer(options);

    expect(connection.session.resources).toEqual([]);
    expect(connection.session.rawSchema(GREETING_TOOL)).toEqual({
      type: 'object',
      properties: { name: { type: 'string' } },
    });
  });

  it('uses the input schema when the schema resource is not JSON', async () => {
    const options = createGreetingServerOptions();
    options.resources = options.resources?.map((resource) =>
      resource.uri.endsWith('.json') ? { ...resource, text: 'not json' } : resource,
    );
    connection = await connectToFakeServer(options);

    expect(connection.session.rawSchema(GREETING_TOOL)).toEqual({
      type: 'object',
      properties: { name: { type: 'string' } },
    });
    expect(connection.session.schemas.get(GREETING_TOOL)?.properties.has('name')).toBe(
      true,
    );
  });

  it('picks up catalog changes on refresh', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());
    connection.options.tools = connection.options.tools.filter(
      (tool) => tool.name !== 'say hello',
    );

    await connection.session.refresh();

    expect(connection.session.snapshot([]).toolNames).toEqual([
      GREETING_TOOL,
      'example:echo',
    ]);
    expect(connection.session.schemas.has('say hello')).toBe(false);
  });

  it('calls tools and decodes text content', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());

    const result = await connection.session.callTool('example:echo', {
      text: 'hi',
    });

    expect(result).toEqual({
      content: [{ kind: 'text', text: 'hi' }],
      isError: false,
    });
    expect(connection.calls).toEqual([
      { name: 'example:echo', arguments: { text: 'hi' } },
    ]);
  });

  it('rejects unknown tools and resources before contacting the server', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());

    await expect(connection.session.callTool('nope', {})).rejects.toBeInstanceOf(
      UnknownToolError,
    );
    await expect(connection.session.readResource('nope')).rejects.toBeInstanceOf(
      UnknownResourceError,
    );
    expect(connection.calls).toEqual([]);
  });

  it('reads text and binary resources by name', async () => {
    connection = await connectToFakeServer(createGreetingServerOptions());

    expect(await connection.session.readResource('resource with spaces')).toEqual([
      {
        kind: 'text',
        uri: 'file:///spaces.txt',
        mimeType: 'text/plain',
        text: 'spaced out',
      },
    ]);
    expect(await connection.session.readResource('logo')).toEqual([
      {
        kind: 'blob',
        uri: 'file:///logo.png',
        mimeType: 'image/png',
        byteLength: 4,
      },
    ]);
  });
});
