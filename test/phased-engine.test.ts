import { assert } from 'chai';

import {
  MalformedSnapshotError,
  TemplateSyntaxError,
  UnclosedBlockError,
  UnknownVariableError,
} from '../src/errors.js';
import {
  fragmentCacheKey,
  MemoryFragmentCache,
} from '../src/fragment-cache.js';
import type { FragmentCacheStore } from '../src/fragment-cache.js';
import { emitMarker } from '../src/marker.js';
import { PhasedTemplateEngine } from '../src/phased-engine.js';
import {
  deserializeSnapshot,
  serializeSnapshot,
} from '../src/snapshot.js';

const D = '@@PHASED@@';

/**
 * Snapshot section of the only marker in `text`.
 */
const snapshotOf = (text: string): string => text.split(D)[2];

describe('phased template engine', function () {
  describe('deferred blocks', function () {
    it('keeps the block verbatim at first pass and renders it at second pass', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const first = engine.renderFirstPass('A{% phased with x %}B{{ x }}C{% endphased %}D', { x: 1 });
      assert.strictEqual(first, 'A' + D + 'B{{ x }}C' + D + serializeSnapshot({ vars: { x: 1 }, refetch: [] }) + D + 'D');
      assert.strictEqual(engine.resolve(first, {}), 'AB1CD');
    });

    it('renders everything outside deferred blocks at first pass', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const first = engine.renderFirstPass('{{ a }}{% phased %}{{ b }}{% endphased %}', { a: 'A', b: 'first' });
      assert.strictEqual(first, 'A' + D + '{{ b }}' + D + serializeSnapshot({ vars: {}, refetch: [] }) + D);
      assert.strictEqual(engine.resolve(first, { b: 'second' }), 'Asecond');
    });

    it('renders a template without deferred blocks in one pass', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      assert.strictEqual(engine.renderFirstPass('{{ a }}-{{ b }}', { a: 1, b: 2 }), '1-2');
    });

    it('resolves nested deferred blocks', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      assert.strictEqual(engine.render('a{% phased %}{% phased %}Z{% endphased %}{% endphased %}b'), 'aZb');
      const tpl = 'a{% phased with y %}{% phased with y %}{{ y }}{% endphased %}{% endphased %}b';
      const first = engine.renderFirstPass(tpl, { y: 'Y' });
      assert.strictEqual(engine.resolve(first), 'aYb');
    });

    it('keeps deferred blocks inside control flow', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const tpl = '{% each items as it %}{% phased with it %}<{{ it }}>{% endphased %}{% endeach %}';
      assert.strictEqual(engine.render(tpl, { items: [ 'a', 'b' ] }), '<a><b>');
    });

    it('fails on unclosed deferred blocks', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      try {
        engine.renderFirstPass('{% phased %}x', {});
        assert.fail('expected UnclosedBlockError');
      } catch (err) {
        assert.instanceOf(err, UnclosedBlockError);
        if (err instanceof UnclosedBlockError) assert.strictEqual(err.expected, 'endphased');
      }
    });

    it('fails on unknown requested variables at first pass', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      assert.throws(() => engine.renderFirstPass('{% phased with nope %}x{% endphased %}', {}), UnknownVariableError, "'nope'");
    });

    it('rejects malformed tag arguments', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      assert.throws(() => engine.parse('{% phased using x %}{% endphased %}'), TemplateSyntaxError);
      assert.throws(() => engine.parse('{% phased with %}{% endphased %}'), TemplateSyntaxError);
    });
  });

  describe('context capture', function () {
    it('captures nothing without names unless keepContext is set', function () {
      const plain = new PhasedTemplateEngine({ delimiter: D });
      const first = plain.renderFirstPass('{% phased %}{{ n }}{% endphased %}', { n: 'first' });
      assert.deepEqual(deserializeSnapshot(snapshotOf(first)), { vars: {}, refetch: [] });
      assert.strictEqual(plain.resolve(first), '');
    });

    it('keeps the whole context but never the refetch names', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D, keepContext: true });
      const tpl = 'S{% phased %}/{{ name }}/{{ csrf_token }}{% endphased %}';
      const first = engine.renderFirstPass(tpl, { name: 'Bob', csrf_token: 'stale-token' });
      assert.deepEqual(deserializeSnapshot(snapshotOf(first)), { vars: { name: 'Bob' }, refetch: [ 'csrf_token' ] });
      assert.notInclude(first, 'stale-token');
      assert.strictEqual(engine.resolve(first, { csrf_token: 'fresh-token' }), 'S/Bob/fresh-token');
    });

    it('captures only the named variables even with keepContext', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D, keepContext: true });
      const first = engine.renderFirstPass('{% phased with a %}{{ a }}{{ b }}{% endphased %}', { a: 'A', b: 'B' });
      assert.deepEqual(deserializeSnapshot(snapshotOf(first)).vars, { a: 'A' });
    });

    it('keeps a requested array intact when one of its elements is requested too', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const tpl = '{% phased with items items.0 %}{% each items as i %}[{{ i }}]{% endeach %}{{ items.0 }}{% endphased %}';
      const first = engine.renderFirstPass(tpl, { items: [ 'a', 'b' ] });
      assert.strictEqual(engine.resolve(first), '[a][b]a');
    });

    it('calls lazy token values at second pass', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const first = engine.renderFirstPass('{% phased %}{{ csrf_token }}{% endphased %}', { csrf_token: () => 'first' });
      assert.strictEqual(engine.resolve(first, { csrf_token: () => 'lazy-token' }), 'lazy-token');
    });

    it('uses a configured renderer for deferred content', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D, renderer: (content) => content.toUpperCase() });
      assert.strictEqual(engine.render('a{% phased %}x{% endphased %}b', {}), 'aXb');
    });
  });

  describe('second pass errors', function () {
    const bad = `a${D}x${D}p1:${Buffer.from('{}', 'utf8').toString('base64')}${D}b`;

    it('reports malformed snapshots without throwing by default', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const result = engine.resolveDetailed(bad);
      assert.strictEqual(result.output, 'ab');
      assert.lengthOf(result.errors, 1);
      assert.strictEqual(engine.resolve(bad), 'ab');
    });

    it('throws malformed snapshots when strict', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D, strictSnapshots: true });
      assert.throws(() => engine.resolve(bad), MalformedSnapshotError);
    });
  });

  describe('cached fragments', function () {
    it('caches first-pass text so deferred blocks stay per-request', function () {
      const store = new MemoryFragmentCache();
      const engine = new PhasedTemplateEngine({ delimiter: D, cacheStore: store });
      const tpl = '{% phasedcache 60 box %}[{% phased %}{{ user }}{% endphased %}]{% endphasedcache %}';
      assert.strictEqual(engine.render(tpl, { user: 'ann' }), '[ann]');
      assert.strictEqual(engine.render(tpl, { user: 'bob' }), '[bob]');
      assert.strictEqual(store.size, 1);
      const marker = emitMarker('{{ user }}', { vars: {}, refetch: [] }, engine.config);
      assert.strictEqual(store.get(fragmentCacheKey('box', [])), `[${marker}]`);
    });

    it('varies on the named values', function () {
      const store = new MemoryFragmentCache();
      const engine = new PhasedTemplateEngine({ delimiter: D, cacheStore: store });
      const tpl = '{% phasedcache 60 "box" user.id %}{{ user.name }}{% endphasedcache %}';
      assert.strictEqual(engine.render(tpl, { user: { id: 1, name: 'A' } }), 'A');
      assert.strictEqual(engine.render(tpl, { user: { id: 2, name: 'B' } }), 'B');
      assert.strictEqual(engine.render(tpl, { user: { id: 1, name: 'C' } }), 'A');
      assert.strictEqual(store.size, 2);
    });

    it('reads the timeout from a literal or a variable', function () {
      const ttls: number[] = [];
      const store: FragmentCacheStore = {
        get: () => undefined,
        set: (_key, _value, ttl) => {
          ttls.push(ttl);
        },
      };
      const engine = new PhasedTemplateEngine({ delimiter: D, cacheStore: store });
      engine.render('{% phasedcache 60 box %}x{% endphasedcache %}', {});
      engine.render('{% phasedcache ttl box %}x{% endphasedcache %}', { ttl: '30' });
      engine.render('{% phasedcache ttl box %}x{% endphasedcache %}', { ttl: 15 });
      assert.deepEqual(ttls, [ 60, 30, 15 ]);
    });

    it('rejects non-integer timeouts', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const tpl = '{% phasedcache ttl box %}x{% endphasedcache %}';
      assert.throws(() => engine.render(tpl, { ttl: 'soon' }), TemplateSyntaxError, "non-integer timeout value: 'ttl'");
      assert.throws(() => engine.render(tpl, { ttl: 1.5 }), TemplateSyntaxError);
      assert.throws(() => engine.render(tpl, {}), TemplateSyntaxError);
    });

    it('requires a timeout and a fragment name', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      assert.throws(() => engine.parse('{% phasedcache 60 %}x{% endphasedcache %}'), TemplateSyntaxError, "'phasedcache' tag requires at least 2 arguments.");
    });

    it('fails on unclosed cached fragments', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      try {
        engine.parse('{% phasedcache 60 box %}x');
        assert.fail('expected UnclosedBlockError');
      } catch (err) {
        assert.instanceOf(err, UnclosedBlockError);
        if (err instanceof UnclosedBlockError) assert.strictEqual(err.expected, 'endphasedcache');
      }
    });

    it('exposes cache-aware rendering outside templates', function () {
      const engine = new PhasedTemplateEngine({ delimiter: D });
      const text = engine.renderFirstPass('<{% phased %}{{ who }}{% endphased %}>', {});
      assert.strictEqual(engine.getOrRenderFragment('greeting', [], () => text, [ { who: 'Ann' } ], 60), '<Ann>');
      assert.strictEqual(engine.getOrRenderFragment('greeting', [], () => 'unused', [ { who: 'Bob' } ], 60), '<Bob>');
    });
  });
});
