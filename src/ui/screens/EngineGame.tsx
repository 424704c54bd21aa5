import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { logGameState } from '../../core/GameStateLogger.js';
import { describeError } from '../../core/errors.js';
import { saveGame } from '../../services/AppServices.js';
import type { AppServices } from '../../services/AppServices.js';
import { EngineMatch } from '../../sessions/EngineMatch.js';
import { ChessBoard, EvalBar } from '../components/index.js';
import { useBoardCursor, useChangeVersion } from '../hooks.js';

interface EngineGameProps {
  services: AppServices;
  onExit: () => void;
}

const CONTROLS = 'Arrow keys: move cursor | Enter: select/move | N: new game | Esc: back to menu';

export default function EngineGame({ services, onExit }: EngineGameProps) {
  const [match] = useState(() => new EngineMatch({
    engine: services.engine,
    depth: services.config.engine.hubDepth,
    evalTimeMs: services.config.engine.analysisTimeMs,
  }));
  const version = useChangeVersion(match);

  const cursor = useBoardCursor({
    flipped: match.humanColor === 'b',
    active: true,
    onPick: square => {
      match.pick(square);
    },
  });

  useEffect(() => {
    const onFinished = (result: string) => {
      saveGame(services, {
        mode: 'engine',
        playerColor: match.humanColor,
        opponent: 'engine',
        result,
        pgn: match.game.pgn(),
      });
    };
    match.on('finished', onFinished);
    return () => {
      match.off('finished', onFinished);
    };
  }, [match, services]);

  // Engine's turn, then a fresh evaluation
  useEffect(() => {
    const report = (err: unknown) => {
      match.message = describeError(err);
      match.emit('change');
    };
    if (!match.isHumanTurn() && !match.game.isGameOver()) {
      match.engineReply()
        .then(move => (move ? match.refreshEvaluation() : undefined))
        .catch(report);
    } else if (!match.game.isGameOver()) {
      match.refreshEvaluation().catch(report);
    }
  }, [match, match.game.fen()]);

  useEffect(() => {
    logGameState('Engine Game', match.message || match.evalText, match.game.getState(), CONTROLS, `MOVES: ${match.moveList()}`);
  }, [version, match]);

  useInput((input, key) => {
    if (key.escape) {
      if (match.selection.selected) {
        match.selection.clear();
        match.emit('change');
      } else {
        onExit();
      }
      return;
    }
    if (input.toLowerCase() === 'n' && match.game.isGameOver()) {
      match.restart();
    }
  });

  const over = match.game.isGameOver();

  return (
    <Box flexDirection="column" padding={1}>
      <Box justifyContent="center" marginBottom={1}>
        <Text bold color="cyan">Game vs engine</Text>
        <Text dimColor> • you play {match.humanColor === 'w' ? 'White' : 'Black'}</Text>
      </Box>

      <Box>
        <ChessBoard
          fen={match.game.fen()}
          flipped={match.humanColor === 'b'}
          cursor={over ? null : cursor}
          selected={match.selection.selected}
          targets={match.selection.targets()}
          lastMove={match.game.lastMove()}
        />
        <EvalBar cp={match.evalCp} height={10} />
        <Box flexDirection="column" marginLeft={1} width={34}>
          <Text>Eval: <Text bold>{match.evalText || '...'}</Text></Text>
          {match.engineThinking && <Text color="yellow">Engine thinking...</Text>}
          {match.game.isCheck() && !over && <Text color="red" bold>CHECK!</Text>}
          {match.selection.selected && (
            <Text color="green">Selected: <Text bold>{match.selection.selected}</Text></Text>
          )}
        </Box>
      </Box>

      <Box marginTop={1}>
        <Text wrap="wrap">Moves: {match.moveList()}</Text>
      </Box>

      {match.message && (
        <Text color={match.message.startsWith('Invalid') || match.message.includes('error') ? 'red' : 'green'}>
          {match.message}
        </Text>
      )}

      {over && (
        <Box marginTop={1} flexDirection="column">
          <Text bold color="yellow">Game Over: {match.result()}</Text>
          <Text dimColor>[N] New Game  [ESC] Menu</Text>
        </Box>
      )}

      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text dimColor>↑↓←→ Navigate  Enter Select/Move  Esc {match.selection.selected ? 'Cancel' : 'Menu'}</Text>
      </Box>
    </Box>
  );
}
