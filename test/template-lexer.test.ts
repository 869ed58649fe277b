import { assert } from 'chai';

import {
  tplBlockName,
  tplTokenize,
  tplTokensToSource,
  TplTokenStream,
} from '../src/template-lexer.js';

describe('template lexer', function () {
  it('splits text, var, block and comment tokens', function () {
    assert.deepEqual(tplTokenize('a{{ b }}c{% d e %}{# f #}'), [
      { type: 'text', contents: 'a', raw: 'a' },
      { type: 'var', contents: 'b', raw: '{{ b }}' },
      { type: 'text', contents: 'c', raw: 'c' },
      { type: 'block', contents: 'd e', raw: '{% d e %}' },
      { type: 'comment', contents: 'f', raw: '{# f #}' },
    ]);
  });

  it('turns an unterminated tag into trailing text', function () {
    assert.deepEqual(tplTokenize('x{% y'), [
      { type: 'text', contents: 'x', raw: 'x' },
      { type: 'text', contents: '{% y', raw: '{% y' },
    ]);
  });

  it('re-serializes tokens byte-for-byte', function () {
    const src = 'A{{x}}B{%  if  a %}{#c#}{{- y | upper }}{% endif %}';
    assert.strictEqual(tplTokensToSource(tplTokenize(src)), src);
  });

  it('reports block names', function () {
    const [ block, text ] = tplTokenize('{% phased with a b %}t');
    assert.strictEqual(tplBlockName(block), 'phased');
    assert.isUndefined(tplBlockName(text));
  });

  it('stream iterates forward only', function () {
    const stream = new TplTokenStream(tplTokenize('a{{ b }}'));
    assert.isTrue(stream.hasMore());
    assert.strictEqual(stream.peek()?.raw, 'a');
    assert.strictEqual(stream.next()?.raw, 'a');
    assert.strictEqual(stream.next()?.raw, '{{ b }}');
    assert.isFalse(stream.hasMore());
    assert.isUndefined(stream.next());
  });
});
