import React, { useEffect, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { logGameState } from '../../core/GameStateLogger.js';
import { describeError } from '../../core/errors.js';
import type { AppServices } from '../../services/AppServices.js';
import type { GameMode, GameRecord, Stats } from '../../services/DatabaseService.js';

interface StatsScreenProps {
  services: AppServices;
  onExit: () => void;
}

const MODE_LABELS: Record<GameMode, string> = {
  engine: 'vs Engine',
  online: 'Online',
  terminal: 'Analysis terminal',
};

const GAME_MODES: readonly GameMode[] = ['engine', 'online', 'terminal'];

const OUTCOME_COLORS: Record<GameRecord['outcome'], string> = {
  win: 'green',
  loss: 'red',
  draw: 'yellow',
  unfinished: 'gray',
};

/** Win share of decided and drawn games, draws counting half */
export function scorePercent(wins: number, draws: number, played: number): string {
  if (played === 0) return '-';
  return `${Math.round(((wins + draws / 2) / played) * 100)}%`;
}

export default function StatsScreen({ services, onExit }: StatsScreenProps) {
  const [data] = useState((): { stats: Stats; recent: GameRecord[] } | { error: string } => {
    if (!services.db) return { error: 'No database: statistics are not recorded.' };
    try {
      return { stats: services.db.getStats(), recent: services.db.getRecentGames(10) };
    } catch (err) {
      return { error: `Cannot read statistics: ${describeError(err)}` };
    }
  });

  useEffect(() => {
    const summary = 'error' in data
      ? data.error
      : `Games ${GAME_MODES.reduce((n, mode) => n + data.stats.games[mode].played, 0)} | ` +
        `Puzzles solved ${data.stats.puzzles.solved}/${data.stats.puzzles.attempted}`;
    logGameState('Statistics', summary, undefined, 'Esc: back to menu');
  }, [data]);

  useInput((input, key) => {
    if (key.escape || key.return || input.toLowerCase() === 'q') onExit();
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Text bold color="cyan">Statistics</Text>

      {'error' in data ? (
        <Box marginTop={1}>
          <Text color="red">{data.error}</Text>
        </Box>
      ) : (
        <Box flexDirection="column" marginTop={1}>
          <Box>
            <Box width={20}><Text bold>Mode</Text></Box>
            <Box width={8}><Text bold>Played</Text></Box>
            <Box width={6}><Text bold>Won</Text></Box>
            <Box width={6}><Text bold>Lost</Text></Box>
            <Box width={7}><Text bold>Drawn</Text></Box>
            <Text bold>Score</Text>
          </Box>
          {GAME_MODES.map(mode => {
            const s = data.stats.games[mode];
            return (
              <Box key={mode}>
                <Box width={20}><Text>{MODE_LABELS[mode]}</Text></Box>
                <Box width={8}><Text>{s.played}</Text></Box>
                <Box width={6}><Text color="green">{s.wins}</Text></Box>
                <Box width={6}><Text color="red">{s.losses}</Text></Box>
                <Box width={7}><Text color="yellow">{s.draws}</Text></Box>
                <Text>{scorePercent(s.wins, s.draws, s.played)}</Text>
              </Box>
            );
          })}

          <Box marginTop={1} flexDirection="column">
            <Text bold>Puzzles</Text>
            <Text>
              Attempted {data.stats.puzzles.attempted} • Solved <Text color="green">{data.stats.puzzles.solved}</Text>
              {' '}• Failed <Text color="red">{data.stats.puzzles.failed}</Text>
              {data.stats.puzzles.bestRating !== null && ` • Best rating ${data.stats.puzzles.bestRating}`}
            </Text>
          </Box>

          <Box marginTop={1} flexDirection="column">
            <Text bold>Recent games</Text>
            {data.recent.length === 0 && <Text dimColor>No games yet.</Text>}
            {data.recent.map(game => (
              <Text key={game.id}>
                <Text dimColor>{game.createdAt}</Text>
                {`  ${MODE_LABELS[game.mode]}  vs ${game.opponent} as ${game.playerColor === 'w' ? 'White' : 'Black'}  ${game.result}  `}
                <Text color={OUTCOME_COLORS[game.outcome]}>{game.outcome}</Text>
              </Text>
            ))}
          </Box>
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>Esc Back</Text>
      </Box>
    </Box>
  );
}
