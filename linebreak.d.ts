declare module 'linebreak' {
  interface Break {
    position: number;
    required: boolean;
  }

  class LineBreaker {
    constructor(str: string);
    nextBreak(): Break | null;
  }

  namespace LineBreaker {
    type LineBreak = Break;
  }

  export = LineBreaker;
}
