/**
 * AWS Documentation Client Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AwsDocsClient, extractAwsDocUrl } from '../aws-docs.js';
import type { ToolSourceConfig } from '../../config/schema.js';
import {
  createFetchMock,
  jsonResponse,
  statusResponse,
  requestBody,
  requestUrl,
  rpcMethods,
  type FetchMock,
} from '../../test-utils/index.js';

const CONFIG: ToolSourceConfig = {
  endpoint: 'https://aws-tools.example.test/',
  max_results: 3,
};

const TOOLS = { jsonrpc: '2.0', id: 1, result: { tools: [{ name: 'search_documentation' }, { name: 'recommend' }] } };

function toolReply(content: unknown): Response {
  return jsonResponse({ jsonrpc: '2.0', id: 2, result: { content } });
}

describe('extractAwsDocUrl', () => {
  it('should find a documentation link inside a question', () => {
    expect(extractAwsDocUrl('see https://docs.aws.amazon.com/vpc/latest/userguide/what-is.html for more')).toBe(
      'https://docs.aws.amazon.com/vpc/latest/userguide/what-is.html'
    );
    expect(extractAwsDocUrl('https://aws.amazon.com/vpc/')).toBeUndefined();
  });
});

describe('AwsDocsClient', () => {
  let fetchMock: FetchMock;

  beforeEach(() => {
    fetchMock = createFetchMock();
  });

  it('should search documentation and label the results', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(TOOLS))
      .mockResolvedValueOnce(
        toolReply([
          {
            title: 'Create a VPC',
            description: 'Use the console to create a VPC',
            url: 'https://docs.aws.amazon.com/vpc/latest/userguide/create-vpc.html',
          },
        ])
      );
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    const results = await client.searchContent('create a vpc');

    expect(results).toEqual([
      {
        title: 'Create a VPC',
        excerpt: 'Use the console to create a VPC...',
        url: 'https://docs.aws.amazon.com/vpc/latest/userguide/create-vpc.html',
        source: 'AWS Documentation',
      },
    ]);
    expect(requestBody(fetchMock, 1)['params']).toEqual({
      name: 'search_documentation',
      arguments: { search_phrase: 'create a vpc', limit: 3 },
    });
  });

  it('should link string content to the AWS search page', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse(TOOLS)).mockResolvedValueOnce(toolReply('Bucket policies grant access'));
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    expect(await client.searchContent('s3 bucket policy', 2)).toEqual([
      {
        title: 'AWS Documentation: s3 bucket policy',
        excerpt: 'Bucket policies grant access...',
        url: 'https://docs.aws.amazon.com/search/doc-search.html?searchPath=documentation&searchQuery=s3%20bucket%20policy',
        source: 'AWS Documentation',
      },
    ]);
  });

  it('should ask for recommendations when the question carries a documentation link', async () => {
    const page = 'https://docs.aws.amazon.com/lambda/latest/dg/welcome.html';
    fetchMock
      .mockResolvedValueOnce(jsonResponse(TOOLS))
      .mockResolvedValueOnce(toolReply([{ title: 'Lambda quotas', summary: 'Limits', url: 'https://docs.aws.amazon.com/q' }]));
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    const results = await client.searchContent(`what else should I read after ${page} today`);

    expect(results).toEqual([
      { title: 'Lambda quotas', excerpt: 'Limits...', url: 'https://docs.aws.amazon.com/q', source: 'AWS Documentation' },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestBody(fetchMock, 1)['params']).toEqual({ name: 'recommend', arguments: { url: page } });
  });

  it('should fall through to search when recommendations are empty', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(TOOLS))
      .mockResolvedValueOnce(toolReply([]))
      .mockResolvedValueOnce(toolReply([{ title: 'Hit', url: 'https://docs.aws.amazon.com/hit' }]));
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    const results = await client.searchContent('https://docs.aws.amazon.com/ec2/index.html');

    expect(results.map((r) => r.title)).toEqual(['Hit']);
    expect(rpcMethods(fetchMock)).toEqual(['tools/list', 'tools/call', 'tools/call']);
  });

  it('should refresh tools once on 404 and return no results', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(TOOLS))
      .mockResolvedValueOnce(statusResponse(404, 'Not Found'))
      .mockResolvedValueOnce(jsonResponse(TOOLS));
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    expect(await client.searchContent('iam roles')).toEqual([]);
    expect(rpcMethods(fetchMock)).toEqual(['tools/list', 'tools/call', 'tools/list']);
  });

  it('should still search when the tool list is unavailable', async () => {
    fetchMock
      .mockResolvedValueOnce(statusResponse(503))
      .mockResolvedValueOnce(toolReply([{ title: 'Still here', url: 'https://docs.aws.amazon.com/x' }]));
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    expect((await client.searchContent('route tables')).map((r) => r.title)).toEqual(['Still here']);
  });

  it('should use the keyword search endpoint when configured and the tools find nothing', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse(TOOLS))
      .mockResolvedValueOnce(toolReply([]))
      .mockResolvedValueOnce(
        jsonResponse({ results: [{ title: 'Keyword hit', summary: 'From REST', url: 'https://docs.aws.amazon.com/k' }] })
      );
    const client = new AwsDocsClient(
      { ...CONFIG, fallback_search_url: 'https://aws-search.example.test/api' },
      { timeoutMs: 1000, fetchFn: fetchMock }
    );

    const results = await client.searchContent('nat gateway');

    expect(results).toEqual([
      { title: 'Keyword hit', excerpt: 'From REST...', url: 'https://docs.aws.amazon.com/k', source: 'AWS Documentation' },
    ]);
    const url = new URL(requestUrl(fetchMock, 2));
    expect(url.origin + url.pathname).toBe('https://aws-search.example.test/api');
    expect(url.searchParams.get('search')).toBe('nat gateway');
    expect(url.searchParams.get('top')).toBe('3');
  });

  it('should never reject on network failure', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const client = new AwsDocsClient(CONFIG, { timeoutMs: 1000, fetchFn: fetchMock });

    await expect(client.searchContent('ec2 pricing')).resolves.toEqual([]);
  });
});
