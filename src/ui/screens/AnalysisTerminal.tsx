/**
 * AnalysisTerminal - typed moves against the engine with live analysis
 *
 * Layout: header line, Unicode board with the evaluation and extra lines
 * to its right, status lines, then the move prompt.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { boardToUnicode } from '../../chess/notation.js';
import { logGameState } from '../../core/GameStateLogger.js';
import { describeError } from '../../core/errors.js';
import { saveGame } from '../../services/AppServices.js';
import type { AppServices } from '../../services/AppServices.js';
import { AnalysisSession } from '../../sessions/AnalysisSession.js';
import { useChangeVersion } from '../hooks.js';

interface AnalysisTerminalProps {
  services: AppServices;
  onExit: () => void;
}

const CONTROLS = "Type a move (e4, Nf3, e2e4) and press Enter. Type 'exit' to quit.";

export default function AnalysisTerminal({ services, onExit }: AnalysisTerminalProps) {
  const { config } = services;
  const [session] = useState(() => new AnalysisSession({
    engine: services.engine,
    tablebase: services.tablebase,
    humanColor: config.ui.humanColor,
    engineDepth: config.engine.terminalDepth,
    analysisTimeMs: config.engine.analysisTimeMs,
    multiPv: config.engine.multiPv,
  }));
  const version = useChangeVersion(session);
  const [input, setInput] = useState('');
  const [ended, setEnded] = useState(false);

  const fail = (err: unknown) => {
    session.status = describeError(err);
    session.emit('change');
  };

  // Engine start failure is shown once, play continues without it
  useEffect(() => {
    if (services.engineError) session.engineUnavailable(services.engineError);
    session.engineMove().catch(fail);
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [session]);

  // Continuous analysis
  useEffect(() => {
    if (ended) return;
    const timer = setInterval(() => {
      if (session.game.isGameOver()) return;
      session.runAnalysis().catch(fail);
    }, config.ui.refreshIntervalMs);
    return () => clearInterval(timer);
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [session, ended, config.ui.refreshIntervalMs]);

  // Game end
  const over = session.game.isGameOver();
  useEffect(() => {
    if (!over) return;
    saveGame(services, {
      mode: 'terminal',
      playerColor: session.humanColor,
      opponent: 'engine',
      result: session.game.result(),
      pgn: session.game.pgn(),
    });
    const timer = setTimeout(() => setEnded(true), 1000);
    return () => clearTimeout(timer);
  }, [over, session, services]);

  // State file
  useEffect(() => {
    const extra = session.variants
      .map((v, i) => `${i + 1}. ${v.scoreText}  ${v.line}`)
      .join('\n');
    logGameState(
      'Analysis Terminal',
      session.status || session.header(),
      session.game.getState(),
      CONTROLS,
      `EVAL: ${session.bestEval()}\n${extra}`
    );
  }, [version, session]);

  useInput(() => {
    if (ended) onExit();
  }, { isActive: ended });

  const handleSubmit = (value: string) => {
    setInput('');
    session.submit(value)
      .then(async result => {
        if (result === 'exit') {
          setEnded(true);
        } else if (result === 'played') {
          await session.engineMove();
        }
      })
      .catch(fail);
  };

  if (ended) {
    return (
      <Box flexDirection="column">
        <Text>{session.endMessage()}</Text>
        <Text>Press any key to exit.</Text>
      </Box>
    );
  }

  const boardLines = boardToUnicode(session.game.fen()).split('\n');

  return (
    <Box flexDirection="column">
      <Text>{session.header()}</Text>
      <Box marginTop={1}>
        <Box flexDirection="column" width={22}>
          {boardLines.map((line, i) => (
            <Text key={i}>{line}</Text>
          ))}
        </Box>
        <Box flexDirection="column" marginLeft={3}>
          <Text>Eval: {session.bestEval()}</Text>
          {session.variants.slice(1).map((v, i) => (
            <Text key={i} wrap="truncate">{v.scoreText}  {v.line}</Text>
          ))}
        </Box>
      </Box>
      <Box marginTop={1} flexDirection="column">
        <Text color={session.status.includes('error') ? 'red' : undefined}>{session.status || ' '}</Text>
        {session.tablebaseStatus && <Text color="magenta">{session.tablebaseStatus}</Text>}
        {session.engineThinking && <Text color="yellow">Engine thinking...</Text>}
      </Box>
      <Box marginTop={1} flexDirection="column">
        <Text>Your move ('exit' to quit):</Text>
        <Box>
          <Text>{'> '}</Text>
          <TextInput value={input} onChange={setInput} onSubmit={handleSubmit} />
        </Box>
      </Box>
    </Box>
  );
}
