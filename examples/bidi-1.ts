import {FontFace, MonospaceShaper, TextLayout, visualIndexMap} from '../src/api.js';

const font = new FontFace({ascent: 800, descent: 200, lineGap: 0, unitsPerEm: 1000});

const text = 'abc אבג def\nשלום (world) 123';

const layout = new TextLayout(text, font, 16, {
  shaper: new MonospaceShaper(),
  maxWidth: 120,
  log: true
});

for (const line of layout.lines) {
  const end = line.contentEnd;
  console.log(`[${line.start}, ${end})`, visualIndexMap(text, 'auto', {start: line.start, end}));
}
