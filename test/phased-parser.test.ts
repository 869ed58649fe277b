import { assert } from 'chai';

import {
  TemplateSyntaxError,
  UnclosedBlockError,
} from '../src/errors.js';
import {
  parsePhasedArgs,
  tplCollectDeferred,
} from '../src/phased-parser.js';
import {
  tplTokenize,
  tplTokensToSource,
  TplTokenStream,
} from '../src/template-lexer.js';

/**
 * Stream positioned right after the first token of `src`.
 */
const afterFirst = (src: string): TplTokenStream => {
  const stream = new TplTokenStream(tplTokenize(src));
  stream.next();
  return stream;
};

describe('deferred block parser', function () {
  it('collects tokens up to the matching end tag', function () {
    const stream = afterFirst('{% phased %}B{{ x }}C{% endphased %}D');
    const tokens = tplCollectDeferred(stream, 'phased', 'endphased');
    assert.strictEqual(tplTokensToSource(tokens), 'B{{ x }}C');
    assert.strictEqual(stream.next()?.raw, 'D');
  });

  it('keeps nested deferred blocks verbatim', function () {
    const stream = afterFirst('{% phased %}a{% phased with y %}{{ y }}{% endphased %}b{% endphased %}rest');
    const literal = tplTokensToSource(tplCollectDeferred(stream, 'phased', 'endphased'));
    assert.strictEqual(literal, 'a{% phased with y %}{{ y }}{% endphased %}b');
    assert.strictEqual(stream.next()?.raw, 'rest');
  });

  it('keeps comments and unknown tags as written', function () {
    const stream = afterFirst('{% phased %}{# note #}{% if a %}{{- b }}{% endif %}{% endphased %}');
    const literal = tplTokensToSource(tplCollectDeferred(stream, 'phased', 'endphased'));
    assert.strictEqual(literal, '{# note #}{% if a %}{{- b }}{% endif %}');
  });

  it('handles deep nesting without recursion', function () {
    const depth = 2000;
    const src = '{% phased %}' + '{% phased %}'.repeat(depth) + 'x' + '{% endphased %}'.repeat(depth + 1);
    const tokens = tplCollectDeferred(afterFirst(src), 'phased', 'endphased');
    assert.lengthOf(tokens, depth * 2 + 1);
  });

  it('fails with UnclosedBlockError naming the terminator', function () {
    const stream = afterFirst('{% phased %}{% phased %}x{% endphased %}');
    try {
      tplCollectDeferred(stream, 'phased', 'endphased');
      assert.fail('expected UnclosedBlockError');
    } catch (err) {
      assert.instanceOf(err, UnclosedBlockError);
      if (err instanceof UnclosedBlockError) {
        assert.strictEqual(err.expected, 'endphased');
        assert.strictEqual(err.tagName, 'phased');
        assert.include(err.message, 'endphased');
      }
    }
  });

  describe('tag arguments', function () {
    it('accepts no arguments or with + names', function () {
      assert.deepEqual(parsePhasedArgs('phased', []), []);
      assert.deepEqual(parsePhasedArgs('phased', [ 'with', 'a', '"b-c"' ]), [ 'a', '"b-c"' ]);
    });

    it('rejects a second word other than with', function () {
      assert.throws(() => parsePhasedArgs('phased', [ 'using', 'a' ]), TemplateSyntaxError, "'phased' tag requires the second argument to be 'with'.");
    });

    it('rejects with without names', function () {
      assert.throws(() => parsePhasedArgs('phased', [ 'with' ]), TemplateSyntaxError, "'phased' tag requires at least one context variable name.");
    });
  });
});
