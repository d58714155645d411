import { act, render, screen } from '@testing-library/react';
import { ObservableValue } from '@watchable/core';
import { describe, expect, it } from 'vitest';
import { Watch, WatchCombined } from './watch.js';

describe('Watch', () => {
  it('should re-render only its own subtree', () => {
    const name = new ObservableValue('Ada');
    let parentRenders = 0;

    function Greeting() {
      parentRenders++;
      return <Watch observable={name} render={(n) => <h1>Hello {n}</h1>} />;
    }

    render(<Greeting />);
    expect(screen.getByRole('heading').textContent).toBe('Hello Ada');

    act(() => {
      name.write('Lin');
    });

    expect(screen.getByRole('heading').textContent).toBe('Hello Lin');
    expect(parentRenders).toBe(1);
  });

  it('should respect shouldRebuild', () => {
    const count = new ObservableValue(1);
    render(
      <Watch
        observable={count}
        shouldRebuild={() => false}
        render={(n) => <span data-testid="count">{n}</span>}
      />
    );

    act(() => {
      count.write(2);
    });

    expect(screen.getByTestId('count').textContent).toBe('1');
  });
});

describe('WatchCombined', () => {
  it('should render the combined value', () => {
    const first = new ObservableValue('Ada');
    const last = new ObservableValue('Lovelace');
    render(
      <WatchCombined
        sources={[first, last]}
        combiner={(parts) => parts.join(' ')}
        render={(full) => <p data-testid="full">{full}</p>}
      />
    );

    expect(screen.getByTestId('full').textContent).toBe('Ada Lovelace');

    act(() => {
      last.write('Byron');
    });

    expect(screen.getByTestId('full').textContent).toBe('Ada Byron');
  });
});
