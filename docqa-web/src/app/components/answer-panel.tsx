import React from "react";

type Props = {
  readonly answer: string;
};

export function AnswerPanel({ answer }: Props): React.JSX.Element {
  return (
    <section>
      <h2>Answer</h2>
      <pre id="answer">{answer}</pre>
    </section>
  );
}
