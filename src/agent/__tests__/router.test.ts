/**
 * Source Router Tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { SourceRouter, formatContextText, GENERAL_KNOWLEDGE_CONTEXT, type SourceTable } from '../router.js';
import { IntentClassifier } from '../intent-classifier.js';
import { ScopeGuard } from '../../security/scope-guard.js';
import type { SearchResult, SourceClient } from '../../sources/types.js';
import { resetAll } from '../../test-utils/index.js';

type SearchFn = SourceClient['searchContent'];

interface FakeSource extends SourceClient {
  searchContent: Mock<SearchFn>;
}

function fakeSource(label: string, results: SearchResult[] = []): FakeSource {
  return { label, searchContent: vi.fn<SearchFn>(async () => results) };
}

const BUCKETS: SearchResult = {
  title: 'Listing buckets',
  excerpt: 'Use ListBuckets to...',
  url: 'https://docs.aws.amazon.com/s3/list',
  source: 'AWS Documentation',
};

const POLICIES: SearchResult = {
  title: 'Bucket policies',
  excerpt: 'A bucket policy is...',
  url: 'https://docs.aws.amazon.com/s3/policy',
  source: 'AWS Documentation',
};

const REFUSAL = 'Please ask about IT topics.';

describe('SourceRouter', () => {
  let aws: FakeSource;
  let microsoft: FakeSource;
  let web: FakeSource;
  let sources: SourceTable;

  function createRouter(extra: { onError?: (message: string) => void; warn?: Mock } = {}): SourceRouter {
    const scopeGuard = new ScopeGuard({ policy: { enforce: true, allow_career_topics: true, llm_check: false } });
    return new SourceRouter({
      classifier: new IntentClassifier({ scopeGuard }),
      sources,
      outOfScopeMessage: REFUSAL,
      onError: extra.onError,
      logger: { warn: extra.warn ?? vi.fn() },
    });
  }

  beforeEach(() => {
    resetAll();
    aws = fakeSource('AWS Documentation', [BUCKETS, POLICIES]);
    microsoft = fakeSource('Microsoft Learn');
    web = fakeSource('Exa Search');
    sources = { aws_docs: aws, microsoft_learn: microsoft, web_search: web };
  });

  it('dispatches to exactly the classified source', async () => {
    const context = await createRouter().route('How do I list S3 buckets?');

    expect(aws.searchContent).toHaveBeenCalledTimes(1);
    expect(aws.searchContent).toHaveBeenCalledWith('How do I list S3 buckets?', undefined, undefined);
    expect(microsoft.searchContent).not.toHaveBeenCalled();
    expect(web.searchContent).not.toHaveBeenCalled();
    expect(context.intent.route).toBe('aws_docs');
    expect(context.results).toEqual([BUCKETS, POLICIES]);
    expect(context.multiSource).toBe(false);
    expect(context.confidenceExplanation).toBe(
      'Pattern matching with 70.0% confidence: AWS-related query detected'
    );
  });

  it('aggregates results in backend order', async () => {
    const context = await createRouter().route('How do I list S3 buckets?');

    expect(context.contextText).toBe(
      '**Listing buckets** (AWS Documentation)\nUse ListBuckets to...\nURL: https://docs.aws.amazon.com/s3/list\n' +
        '\n' +
        '**Bucket policies** (AWS Documentation)\nA bucket policy is...\nURL: https://docs.aws.amazon.com/s3/policy\n'
    );
  });

  it('refuses out-of-scope questions without calling any source', async () => {
    const context = await createRouter().route("What's the best pizza topping?");

    expect(context.intent.route).toBe('out_of_scope');
    expect(context.results).toEqual([]);
    expect(context.contextText).toBe(REFUSAL);
    expect(aws.searchContent).not.toHaveBeenCalled();
    expect(microsoft.searchContent).not.toHaveBeenCalled();
    expect(web.searchContent).not.toHaveBeenCalled();
  });

  it('answers greetings from general knowledge', async () => {
    const context = await createRouter().route('hello');

    expect(context.intent.route).toBe('general_knowledge');
    expect(context.contextText).toBe(GENERAL_KNOWLEDGE_CONTEXT);
    expect(web.searchContent).not.toHaveBeenCalled();
  });

  it('passes the caller signal to the source', async () => {
    const controller = new AbortController();

    await createRouter().route('Latest CVEs affecting nginx', { signal: controller.signal });

    expect(web.searchContent).toHaveBeenCalledWith('Latest CVEs affecting nginx', undefined, controller.signal);
  });

  it('treats a dispatch failure as no results', async () => {
    aws.searchContent.mockRejectedValue(new Error('kaput'));
    const onError = vi.fn();
    const warn = vi.fn();

    const context = await createRouter({ onError, warn }).route('How do I list S3 buckets?');

    expect(context.results).toEqual([]);
    expect(context.contextText).toBe('');
    expect(onError).toHaveBeenCalledWith('⚠️ AWS Documentation lookup failed: kaput');
    expect(warn).toHaveBeenCalledWith('⚠️ AWS Documentation lookup failed: kaput');
  });

  it('returns frozen contexts', async () => {
    const context = await createRouter().route('How do I list S3 buckets?');

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.results)).toBe(true);
  });
});

describe('formatContextText', () => {
  it('is empty without results', () => {
    expect(formatContextText([])).toBe('');
  });
});
