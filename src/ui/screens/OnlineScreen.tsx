/**
 * OnlineScreen - login, lobby, match search and the game itself
 */

import React, { useEffect, useRef, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import { logGameState } from '../../core/GameStateLogger.js';
import { describeError } from '../../core/errors.js';
import { OnlineClient } from '../../online/OnlineClient.js';
import { saveGame } from '../../services/AppServices.js';
import type { AppServices } from '../../services/AppServices.js';
import { OnlineMatch } from '../../sessions/OnlineMatch.js';
import { ChessBoard, Menu } from '../components/index.js';
import { useBoardCursor, useChangeVersion } from '../hooks.js';

interface OnlineScreenProps {
  services: AppServices;
  onExit: () => void;
  onPlayEngine: () => void;
  onShowStats: () => void;
}

type Phase = 'login' | 'connecting' | 'lobby' | 'opponent' | 'waiting' | 'playing';

type LobbyAction = 'match' | 'stats' | 'logout';
type OpponentAction = 'random' | 'engine' | 'cancel';

function OnlineGameView({ match, services, onLeave }: {
  match: OnlineMatch;
  services: AppServices;
  onLeave: () => void;
}) {
  const version = useChangeVersion(match);

  useEffect(() => {
    const onFinished = (result: string) => {
      saveGame(services, {
        mode: 'online',
        playerColor: match.color,
        opponent: match.opponent,
        result,
        pgn: match.game.pgn(),
      });
    };
    match.on('finished', onFinished);
    match.start();
    return () => {
      match.off('finished', onFinished);
      match.stop();
    };
  }, [match, services]);

  const cursor = useBoardCursor({
    flipped: match.color === 'b',
    active: match.isMyTurn(),
    initialRow: match.color === 'w' ? 6 : 1,
    onPick: square => {
      match.pick(square);
    },
  });

  useEffect(() => {
    logGameState('Online Game', match.message, match.game.getState(),
      'Arrow keys: move cursor | Enter: select/move | R: resign | Esc: leave',
      `OPPONENT: ${match.opponent}\nCOLOR: ${match.color === 'w' ? 'White' : 'Black'}`);
  }, [version, match]);

  useInput((input, key) => {
    if (key.escape) {
      if (match.selection.selected) {
        match.selection.clear();
        match.emit('change');
        return;
      }
      if (!match.over) match.resign();
      onLeave();
      return;
    }
    if (input.toLowerCase() === 'r' && !match.over) {
      match.resign();
    }
  });

  return (
    <Box flexDirection="column" padding={1}>
      <Box justifyContent="center" marginBottom={1}>
        <Text bold color="cyan">Online game</Text>
        <Text dimColor> • vs {match.opponent} • you play {match.color === 'w' ? 'White' : 'Black'}</Text>
      </Box>

      <Box>
        <ChessBoard
          fen={match.game.fen()}
          flipped={match.color === 'b'}
          cursor={match.isMyTurn() ? cursor : null}
          selected={match.selection.selected}
          targets={match.selection.targets()}
          lastMove={match.game.lastMove()}
        />
        <Box flexDirection="column" marginLeft={2} width={34}>
          <Text>{match.isMyTurn() ? 'Your move' : match.over ? 'Finished' : `${match.opponent} to move`}</Text>
          {match.game.isCheck() && !match.over && <Text color="red" bold>CHECK!</Text>}
          {match.result && <Text bold color="yellow">Result: {match.result}</Text>}
        </Box>
      </Box>

      {match.message && <Text color={match.message.startsWith('Invalid') ? 'red' : 'green'}>{match.message}</Text>}

      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text dimColor>
          {match.over ? 'Esc Lobby' : '↑↓←→ Navigate  Enter Select/Move  [R] Resign  Esc Resign and leave'}
        </Text>
      </Box>
    </Box>
  );
}

export default function OnlineScreen({ services, onExit, onPlayEngine, onShowStats }: OnlineScreenProps) {
  const { server } = services.config;
  const [client] = useState(() => new OnlineClient({
    host: server.host,
    port: server.port,
    connectTimeoutMs: server.connectTimeoutMs,
    replyTimeoutMs: server.replyTimeoutMs,
    matchTimeoutMs: server.matchTimeoutMs,
  }));
  const hasCredentials = server.username !== '' && server.password !== '';
  const [phase, setPhase] = useState<Phase>(hasCredentials ? 'connecting' : 'login');
  const [username, setUsername] = useState(server.username);
  const [password, setPassword] = useState(server.password);
  const [field, setField] = useState<'username' | 'password'>('username');
  const [error, setError] = useState<string | null>(null);
  const [match, setMatch] = useState<OnlineMatch | null>(null);
  const mounted = useRef(true);

  useEffect(() => {
    mounted.current = true;
    const onDisconnected = () => {
      if (!mounted.current) return;
      setError('Disconnected from server.');
      setPhase(current => (current === 'playing' ? current : 'login'));
    };
    client.on('disconnected', onDisconnected);
    return () => {
      mounted.current = false;
      client.off('disconnected', onDisconnected);
      client.close();
    };
  }, [client]);

  const signIn = async (user: string, pass: string) => {
    setPhase('connecting');
    setError(null);
    try {
      await client.connect();
      await client.login(user, pass);
      if (mounted.current) setPhase('lobby');
    } catch (err) {
      client.close();
      if (!mounted.current) return;
      setError(describeError(err));
      setField('username');
      setPhase('login');
    }
  };

  // Credentials from config or flags log in straight away
  useEffect(() => {
    if (hasCredentials) {
      signIn(server.username, server.password).catch(err => setError(describeError(err)));
    }
    // eslint-disable-next-line react-hooks/exhaustive-deps
  }, []);

  useEffect(() => {
    if (phase === 'playing') return;
    const status = error ?? (phase === 'waiting' ? 'Waiting for an opponent...' : `Online: ${phase}`);
    logGameState('Online Play', status, undefined,
      phase === 'login' ? 'Type username and password, Enter to confirm, Esc to go back.' : undefined,
      `SERVER: ${client.address}`);
  }, [phase, error, client]);

  const findMatch = async () => {
    setPhase('waiting');
    setError(null);
    try {
      const info = await client.startMatch();
      if (!mounted.current) return;
      setMatch(new OnlineMatch(client, info));
      setPhase('playing');
    } catch (err) {
      if (!mounted.current) return;
      setError(describeError(err));
      setPhase(client.username ? 'lobby' : 'login');
    }
  };

  useInput((_input, key) => {
    if (!key.escape) return;
    if (phase === 'waiting') {
      client.cancelMatch();
    } else if (phase === 'login' || phase === 'connecting') {
      onExit();
    }
  }, { isActive: phase === 'login' || phase === 'connecting' || phase === 'waiting' });

  const onLobby = (action: LobbyAction) => {
    if (action === 'match') {
      setPhase('opponent');
    } else if (action === 'stats') {
      onShowStats();
    } else {
      client.close();
      setUsername('');
      setPassword('');
      setField('username');
      setPhase('login');
    }
  };

  const onOpponent = (action: OpponentAction) => {
    if (action === 'random') {
      findMatch().catch(err => setError(describeError(err)));
    } else if (action === 'engine') {
      onPlayEngine();
    } else {
      setPhase('lobby');
    }
  };

  if (phase === 'playing' && match) {
    return (
      <OnlineGameView
        match={match}
        services={services}
        onLeave={() => {
          setMatch(null);
          setPhase(client.username ? 'lobby' : 'login');
        }}
      />
    );
  }

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">Online play</Text>
        <Text dimColor> • {client.address}{client.username ? ` • ${client.username}` : ''}</Text>
      </Box>

      {phase === 'login' && (
        <Box flexDirection="column">
          <Box>
            <Text>Username: </Text>
            {field === 'username' ? (
              <TextInput
                value={username}
                onChange={setUsername}
                onSubmit={value => {
                  if (value.trim()) setField('password');
                }}
              />
            ) : (
              <Text>{username}</Text>
            )}
          </Box>
          {field === 'password' && (
            <Box>
              <Text>Password: </Text>
              <TextInput
                value={password}
                onChange={setPassword}
                mask="*"
                onSubmit={value => {
                  signIn(username.trim(), value).catch(err => setError(describeError(err)));
                }}
              />
            </Box>
          )}
        </Box>
      )}

      {phase === 'connecting' && <Text color="yellow">Connecting to {client.address}...</Text>}

      {phase === 'lobby' && (
        <Menu<LobbyAction>
          title="Lobby"
          items={[
            { id: 'match', label: 'Quick match', desc: 'Pick an opponent' },
            { id: 'stats', label: 'Statistics' },
            { id: 'logout', label: 'Log out' },
          ]}
          onSelect={onLobby}
          onBack={onExit}
        />
      )}

      {phase === 'opponent' && (
        <Menu<OpponentAction>
          title="Choose an opponent"
          items={[
            { id: 'random', label: 'Random online player' },
            { id: 'engine', label: 'Play the engine' },
            { id: 'cancel', label: 'Cancel' },
          ]}
          onSelect={onOpponent}
          onBack={() => setPhase('lobby')}
        />
      )}

      {phase === 'waiting' && <Text color="yellow">Waiting for an opponent... (Esc to cancel)</Text>}

      {error && <Text color="red">⚠ {error}</Text>}

      <Box marginTop={1}>
        <Text dimColor>Esc Back</Text>
      </Box>
    </Box>
  );
}
