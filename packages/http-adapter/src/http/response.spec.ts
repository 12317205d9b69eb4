import { gunzipSync } from 'node:zlib';

import { LogicError } from '@switchyard/common';
import { describe, expect, it } from 'vitest';

import { JsonResponse } from './json-response';
import { BufferedOutput, type OutputSink } from './output';
import { RedirectResponse } from './redirect-response';
import { SwitchyardRequest } from './request';
import { SwitchyardResponse } from './response';
import { StreamedResponse } from './streamed-response';
import { type ContentCallback, GzipWriter, type ResponseWriter } from './writers';

class EofWriter implements ResponseWriter {
  async write(output: OutputSink, content: ContentCallback): Promise<void> {
    await content(output);
    output.write('EOF');
  }
}

describe('SwitchyardResponse', () => {
  it('should write string content to the sink', async () => {
    const output = new BufferedOutput();

    await new SwitchyardResponse('hello').write(output);

    expect(output.toString()).toBe('hello');
  });

  it('should write the content at most once', async () => {
    const output = new BufferedOutput();
    const response = new SwitchyardResponse(sink => {
      sink.write('X');
    });

    await response.write(output);
    await response.write(output);

    expect(output.toString()).toBe('X');
    expect(response.isWritten()).toBe(true);
  });

  it('should allow another write after a failed one', async () => {
    let attempts = 0;
    const flakyWriter: ResponseWriter = {
      async write(output, content) {
        attempts++;

        if (attempts === 1) {
          throw new Error('sink gone');
        }

        await content(output);
      },
    };
    const response = new SwitchyardResponse('X').setWriter(flakyWriter);

    await expect(response.write(new BufferedOutput())).rejects.toThrow('sink gone');
    expect(response.isWritten()).toBe(false);

    const output = new BufferedOutput();

    await response.write(output);
    await response.write(output);

    expect(output.toString()).toBe('X');
    expect(attempts).toBe(2);
  });

  it('should share a write that is still in flight', async () => {
    const output = new BufferedOutput();
    const response = new SwitchyardResponse(async sink => {
      await Promise.resolve();
      sink.write('X');
    });

    await Promise.all([response.write(output), response.write(output)]);

    expect(output.toString()).toBe('X');
  });

  it('should run a custom writer around the content', async () => {
    const output = new BufferedOutput();
    const response = new SwitchyardResponse('FOO BAR').setWriter(new EofWriter());

    await response.write(output);

    expect(output.toString()).toBe('FOO BAREOF');
  });

  it('should compress through the gzip writer', async () => {
    const output = new BufferedOutput();

    await new SwitchyardResponse('compress me').setWriter(new GzipWriter()).write(output);

    expect(gunzipSync(output.toBuffer()).toString('utf8')).toBe('compress me');
  });

  it('should expose the content produced by a callback', async () => {
    const response = new SwitchyardResponse(sink => {
      sink.write('a');
      sink.write('b');
    });

    await expect(response.getContent()).resolves.toBe('ab');
  });

  it('should replace the content with setContent', async () => {
    const response = new SwitchyardResponse('before');

    response.setContent('after');

    await expect(response.getContent()).resolves.toBe('after');

    response.setContent(null);

    await expect(response.getContent()).resolves.toBe('');
  });

  it('should carry the reason phrase of the status', () => {
    expect(new SwitchyardResponse(null, 404).statusText).toBe('Not Found');
    expect(new SwitchyardResponse(null, 299).statusText).toBe('');
  });

  it('should drop the body of a HEAD response and default the content type', async () => {
    const response = new SwitchyardResponse('body').prepare(new SwitchyardRequest({ method: 'HEAD', url: '/' }));

    await expect(response.getContent()).resolves.toBe('');
    expect(response.getContentType()).toBe('text/plain; charset=utf-8');
  });

  it('should drop the body and content headers of a 204 response', async () => {
    const response = new SwitchyardResponse('body', 204, { 'content-type': 'text/plain', 'content-length': '4' });

    response.prepare(new SwitchyardRequest({ method: 'GET', url: '/' }));

    await expect(response.getContent()).resolves.toBe('');
    expect(response.getContentType()).toBeNull();
    expect(response.getHeader('content-length')).toBeNull();
  });

  it('should keep the content type already set', () => {
    const response = new SwitchyardResponse('{}', 200, { 'content-type': 'application/json' });

    response.prepare(new SwitchyardRequest({ method: 'GET', url: '/' }));

    expect(response.getContentType()).toBe('application/json');
  });

  it('should merge cache-control directives', () => {
    const response = new SwitchyardResponse();

    response.setPrivate().setMaxAge(60).setPublic();

    expect(response.getHeader('cache-control')).toBe('max-age=60, public');
  });

  it('should quote etags and mark weak ones', () => {
    const response = new SwitchyardResponse();

    response.setEtag('abc', true);

    expect(response.etag).toBe('W/"abc"');

    response.setEtag(null);

    expect(response.etag).toBeNull();
  });

  it('should format last-modified as an HTTP date', () => {
    const response = new SwitchyardResponse();
    const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

    response.setLastModified(date);

    expect(response.getHeader('last-modified')).toBe('Tue, 02 Jan 2024 03:04:05 GMT');
    expect(response.lastModified?.getTime()).toBe(date.getTime());
  });
});

describe('StreamedResponse', () => {
  it('should refuse new content', () => {
    const response = new StreamedResponse(sink => {
      sink.write('streamed');
    });

    expect(() => response.setContent('other')).toThrow(LogicError);
    expect(() => response.setContent('other')).toThrow('The content cannot be set on a StreamedResponse instance.');
  });

  it('should accept null content and write nothing', async () => {
    const output = new BufferedOutput();
    const response = new StreamedResponse(sink => {
      sink.write('streamed');
    });

    response.setContent(null);
    await response.write(output);

    expect(output.toString()).toBe('');
  });

  it('should stream the callback output when written', async () => {
    const output = new BufferedOutput();

    await new StreamedResponse(sink => {
      sink.write('chunk-1,');
      sink.write('chunk-2');
    }).write(output);

    expect(output.toString()).toBe('chunk-1,chunk-2');
  });
});

describe('JsonResponse', () => {
  it('should encode the data and set the content type', async () => {
    const response = new JsonResponse({ id: 1, tags: ['a'] }, 201);

    await expect(response.getContent()).resolves.toBe('{"id":1,"tags":["a"]}');
    expect(response.status).toBe(201);
    expect(response.getContentType()).toBe('application/json; charset=utf-8');
  });
});

describe('RedirectResponse', () => {
  it('should point the location header at the target', () => {
    const response = new RedirectResponse('/login');

    expect(response.status).toBe(302);
    expect(response.getHeader('location')).toBe('/login');
  });
});
