/**
 * KibitzHub - main menu and screen routing for the chess hub
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import { logGameState } from '../core/GameStateLogger.js';
import type { AppServices } from '../services/AppServices.js';
import { Menu } from './components/index.js';
import EngineGame from './screens/EngineGame.js';
import OnlineScreen from './screens/OnlineScreen.js';
import PuzzleScreen from './screens/PuzzleScreen.js';
import ReviewScreen from './screens/ReviewScreen.js';
import StatsScreen from './screens/StatsScreen.js';

export type HubScreen = 'menu' | 'engine' | 'review' | 'puzzles' | 'online' | 'stats';

type MenuAction = Exclude<HubScreen, 'menu'> | 'quit';

const MENU_ITEMS: { id: MenuAction; label: string; desc: string }[] = [
  { id: 'engine', label: 'Play the engine', desc: 'Board game against the UCI engine' },
  { id: 'review', label: 'Review a game', desc: 'Step through a PGN with analysis' },
  { id: 'puzzles', label: 'Puzzles', desc: 'Solve puzzles from the online service' },
  { id: 'online', label: 'Online play', desc: 'Log in and find an opponent' },
  { id: 'stats', label: 'Statistics', desc: 'Your results so far' },
  { id: 'quit', label: 'Quit', desc: '' },
];

interface KibitzHubProps {
  services: AppServices;
}

export default function KibitzHub({ services }: KibitzHubProps) {
  const { exit } = useApp();
  const [screen, setScreen] = useState<HubScreen>('menu');
  // Where Esc from the statistics screen returns to
  const [statsReturn, setStatsReturn] = useState<HubScreen>('menu');

  useEffect(() => {
    if (screen === 'menu') {
      logGameState('Main Menu', 'Choose an activity',
        undefined, 'Arrow keys or 1-6 to choose, Enter to select.',
        MENU_ITEMS.map((item, i) => `${i + 1}. ${item.label}`).join('\n'));
    }
  }, [screen]);

  const back = () => setScreen('menu');

  switch (screen) {
    case 'engine':
      return <EngineGame services={services} onExit={back} />;
    case 'review':
      return <ReviewScreen services={services} onExit={back} />;
    case 'puzzles':
      return <PuzzleScreen services={services} onExit={back} />;
    case 'online':
      return (
        <OnlineScreen
          services={services}
          onExit={back}
          onPlayEngine={() => setScreen('engine')}
          onShowStats={() => {
            setStatsReturn('online');
            setScreen('stats');
          }}
        />
      );
    case 'stats':
      return (
        <StatsScreen
          services={services}
          onExit={() => {
            setScreen(statsReturn);
            setStatsReturn('menu');
          }}
        />
      );
    case 'menu':
      break;
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Menu<MenuAction>
        title="♞ kibitz chess hub"
        items={MENU_ITEMS}
        onSelect={action => {
          if (action === 'quit') {
            exit();
          } else {
            setStatsReturn('menu');
            setScreen(action);
          }
        }}
      />
      {services.engineError && (
        <Box marginTop={1}>
          <Text color="yellow">Engine unavailable: {services.engineError}</Text>
        </Box>
      )}
      {!services.db && (
        <Text color="yellow">Database unavailable: results will not be recorded.</Text>
      )}
    </Box>
  );
}
