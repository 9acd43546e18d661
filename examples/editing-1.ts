import {FontFace, MonospaceShaper, TextEditor, TextLayout} from '../src/api.js';

const font = new FontFace({ascent: 800, descent: 200, lineGap: 0, unitsPerEm: 1000});

const layout = new TextLayout('Hello\nWorld', font, 16, {shaper: new MonospaceShaper()});
const editor = new TextEditor(layout);

editor.moveRight('line');
editor.insertText(', there');
editor.moveDown();
editor.moveRight('word', true);
editor.insertText('friend');

layout.log();
console.log(editor.text, editor.selection.toString(), editor.cursorRect());

editor.undo();
console.log(editor.text);
