import React, { useCallback, useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { logGameState } from '../../core/GameStateLogger.js';
import { describeError } from '../../core/errors.js';
import type { Square } from '../../chess/types.js';
import { PuzzleSession } from '../../puzzles/PuzzleSession.js';
import { savePuzzle } from '../../services/AppServices.js';
import type { AppServices } from '../../services/AppServices.js';
import { BoardSelection } from '../../sessions/BoardSelection.js';
import { ChessBoard } from '../components/index.js';
import { useBoardCursor } from '../hooks.js';

interface PuzzleScreenProps {
  services: AppServices;
  onExit: () => void;
}

const CONTROLS = 'Arrow keys: move cursor | Enter: select/move | N: next puzzle | Esc: back to menu';

export default function PuzzleScreen({ services, onExit }: PuzzleScreenProps) {
  const [session, setSession] = useState<PuzzleSession | null>(null);
  const [selection, setSelection] = useState<BoardSelection | null>(null);
  const [loading, setLoading] = useState(false);
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [, setVersion] = useState(0);

  const loadNext = useCallback(async () => {
    setLoading(true);
    setError(null);
    setMessage(null);
    try {
      const puzzle = await services.puzzles.next();
      const next = new PuzzleSession(puzzle);
      setSession(next);
      setSelection(new BoardSelection(next.game));
      setMessage(`Find the best move for ${next.solver === 'w' ? 'White' : 'Black'}.`);
    } catch (err) {
      setError(describeError(err));
    } finally {
      setLoading(false);
    }
  }, [services]);

  useEffect(() => {
    loadNext().catch(err => setError(describeError(err)));
  }, [loadNext]);

  const onPick = (square: Square) => {
    if (!session || !selection || session.status !== 'playing') return;
    const outcome = selection.pick(square, session.solver);
    if (outcome.kind === 'move') {
      const result = session.tryMove(outcome.move);
      setMessage(result.message);
      // One record per puzzle: failed at the first mistake, else solved
      const firstMistake = result.kind === 'incorrect' && session.mistakes === 1;
      const cleanSolve = result.kind === 'solved' && session.mistakes === 0;
      if (firstMistake || cleanSolve) {
        savePuzzle(services, {
          puzzleId: session.puzzle.id,
          rating: session.puzzle.rating,
          solved: cleanSolve,
        });
      }
    } else if (outcome.kind === 'invalid') {
      setMessage('Invalid move! Try again.');
    }
    setVersion(v => v + 1);
  };

  const cursor = useBoardCursor({
    flipped: session?.solver === 'b',
    active: !loading && session?.status === 'playing',
    initialRow: 6,
    onPick,
  });

  useInput((input, key) => {
    if (key.escape) {
      onExit();
      return;
    }
    if (input.toLowerCase() === 'n' && !loading) {
      loadNext().catch(err => setError(describeError(err)));
    }
  });

  useEffect(() => {
    const status = loading ? 'Loading puzzle...' : error ?? message ?? '';
    logGameState('Puzzle', status, session?.game.getState(), CONTROLS,
      session ? `PUZZLE: ${session.puzzle.id} (rating ${session.puzzle.rating})` : '');
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Box justifyContent="center" marginBottom={1}>
        <Text bold color="cyan">Puzzles</Text>
        {session && <Text dimColor> • #{session.puzzle.id} • rating {session.puzzle.rating}</Text>}
      </Box>

      {loading && <Text color="yellow">Loading puzzle...</Text>}
      {error && <Text color="red">⚠ {error}</Text>}

      {session && selection && (
        <Box>
          <ChessBoard
            fen={session.game.fen()}
            flipped={session.solver === 'b'}
            cursor={session.status === 'playing' ? cursor : null}
            selected={selection.selected}
            targets={selection.targets()}
            lastMove={session.game.lastMove()}
          />
          <Box flexDirection="column" marginLeft={2} width={34}>
            <Text>To move: <Text bold>{session.game.turn() === 'w' ? 'White' : 'Black'}</Text></Text>
            <Text dimColor>Progress: {session.progress}/{session.puzzle.solution.length}</Text>
            {session.puzzle.themes.length > 0 && (
              <Text dimColor wrap="truncate">Themes: {session.puzzle.themes.join(', ')}</Text>
            )}
            {session.status === 'solved' && <Text color="green" bold>Solved!</Text>}
            {session.status === 'broken' && <Text color="red">Puzzle data is broken.</Text>}
          </Box>
        </Box>
      )}

      {message && (
        <Text color={message.startsWith('Incorrect') || message.startsWith('Invalid') ? 'red' : 'green'}>{message}</Text>
      )}

      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text dimColor>↑↓←→ Navigate  Enter Select/Move  [N] Next puzzle  Esc Menu</Text>
      </Box>
    </Box>
  );
}
