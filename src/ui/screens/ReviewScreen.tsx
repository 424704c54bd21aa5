import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { thermometer } from '../../chess/notation.js';
import { isSquare } from '../../chess/types.js';
import type { Square } from '../../chess/types.js';
import { logGameState } from '../../core/GameStateLogger.js';
import { describeError } from '../../core/errors.js';
import type { AppServices } from '../../services/AppServices.js';
import { ReviewSession } from '../../sessions/ReviewSession.js';
import { ChessBoard } from '../components/index.js';
import { useChangeVersion } from '../hooks.js';

interface ReviewScreenProps {
  services: AppServices;
  onExit: () => void;
}

/** Wait after the last step before analysing */
const ANALYSIS_DEBOUNCE_MS = 300;

function ReviewView({ session, onBack }: { session: ReviewSession; onBack: () => void }) {
  const version = useChangeVersion(session);
  const [flipped, setFlipped] = useState(false);
  const index = session.currentIndex;

  useEffect(() => {
    const timer = setTimeout(() => {
      session.analyse().catch(err => {
        session.status = describeError(err);
      });
    }, ANALYSIS_DEBOUNCE_MS);
    return () => clearTimeout(timer);
  }, [session, index]);

  useEffect(() => {
    const lines = session.variants.map((v, i) => `${i + 1}. ${v.scoreText}  ${v.line}`).join('\n');
    logGameState('Game Review', `${session.title()} | ply ${index}/${session.positions.length - 1}`, undefined,
      '←/→: step | ↑/↓: start/end | F: flip | Esc: back', `FEN: ${session.current.fen}\n${lines}`);
  }, [version, session, index]);

  useInput((input, key) => {
    if (key.escape) onBack();
    else if (key.rightArrow) session.next();
    else if (key.leftArrow) session.prev();
    else if (key.upArrow) session.first();
    else if (key.downArrow) session.last();
    else if (input.toLowerCase() === 'f') setFlipped(f => !f);
  });

  const position = session.current;
  const best = session.variants[0];

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">{session.title()}</Text>
      <Box marginTop={1}>
        <ChessBoard
          fen={position.fen}
          flipped={flipped}
          lastMove={lastMoveOf(position.uci)}
        />
        <Box flexDirection="column" marginLeft={2} width={50}>
          <Text>Ply {index}/{session.positions.length - 1}{position.san ? `: ${position.san}` : ''}</Text>
          {best ? <Text>Eval: {best.scoreText} {thermometer(best.cp)}</Text> : <Text dimColor>Eval: ---</Text>}
          {session.variants.map((v, i) => (
            <Text key={i} wrap="truncate">{i + 1}. {v.scoreText}  {v.line}</Text>
          ))}
          {session.status && <Text color="red">{session.status}</Text>}
        </Box>
      </Box>
      <Box marginTop={1}>
        <Text wrap="wrap" dimColor>{session.moveText()}</Text>
      </Box>
      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text dimColor>←/→ Step  ↑/↓ Start/End  [F] Flip  Esc Back</Text>
      </Box>
    </Box>
  );
}

function lastMoveOf(uci: string | null): { from: Square; to: Square } | null {
  if (!uci) return null;
  const from = uci.slice(0, 2);
  const to = uci.slice(2, 4);
  return isSquare(from) && isSquare(to) ? { from, to } : null;
}

export default function ReviewScreen({ services, onExit }: ReviewScreenProps) {
  const [file, setFile] = useState('');
  const [session, setSession] = useState<ReviewSession | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    if (!session) {
      logGameState('Game Review', error ?? 'Enter a PGN file path', undefined, 'Enter: load | Esc: back');
    }
  }, [session, error]);

  useInput((_input, key) => {
    if (key.escape) onExit();
  }, { isActive: session === null });

  const load = (value: string) => {
    const path = value.trim();
    if (!path) return;
    try {
      setSession(ReviewSession.fromFile(path, {
        engine: services.engine,
        multiPv: services.config.engine.multiPv,
      }));
      setError(null);
    } catch (err) {
      setError(describeError(err));
    }
  };

  if (session) {
    return <ReviewView session={session} onBack={() => setSession(null)} />;
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Review a game</Text>
      <Box marginTop={1}>
        <Text>PGN file: </Text>
        <TextInput value={file} onChange={setFile} onSubmit={load} placeholder="games/mygame.pgn" />
      </Box>
      {error && <Text color="red">⚠ {error}</Text>}
      <Box marginTop={1}>
        <Text dimColor>Enter Load  Esc Back</Text>
      </Box>
    </Box>
  );
}
