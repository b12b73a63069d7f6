#!/usr/bin/env node

/**
 * StakeVote CLI
 * Command-line interface for projects, staking, finalization and withdrawal
 */

import { createStakeVote, Crypto, parseAmount, type StakeVote } from '../stakevote/index.js';
import * as readline from 'readline';

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

function prompt(question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, resolve);
  });
}

let node: StakeVote | null = null;

function stakevote(): StakeVote {
  node ??= createStakeVote();
  return node;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  console.log('StakeVote CLI - Token-weighted staking and voting\n');

  try {
    switch (command) {
      case 'create':
        await createProject();
        break;
      case 'vote':
        await castVote(args[1], args[2], args[3]);
        break;
      case 'finalize':
        await finalizeProject(args[1]);
        break;
      case 'unstake':
        await unstake(args[1], args[2]);
        break;
      case 'status':
        await showStatus(args[1]);
        break;
      case 'list':
        await listProjects();
        break;
      case 'balance':
        await showBalance(args[1], args[2]);
        break;
      case 'events':
        await showEvents(args[1]);
        break;
      case 'keygen':
        keygen();
        break;
      case 'health':
        await healthCheck();
        break;
      case 'help':
      default:
        showHelp();
    }
  } finally {
    node?.stop();
    rl.close();
  }
}

function showHelp() {
  console.log(`Usage: stakevote <command> [options]

Commands:
  create                              Create a new project interactively (admin)
  vote <project-id> <amount> [key]    Stake tokens on a project
  finalize <project-id>               Close voting and pick the winner (admin)
  unstake <project-id> [key]          Withdraw your stake after finalization
  status <project-id>                 Show project status
  list                                List recent projects
  balance <project-id> [key]          Show stake and withdrawable amount
  events [project-id]                 Show recorded events

  keygen                              Generate a new identity keypair
  health                              Check service health
  help                                Show this help message

The participant key defaults to this node's identity (NODE_PRIVATE_KEY).

Examples:
  stakevote create
  stakevote vote 1 600
  stakevote finalize 1
  stakevote unstake 1
`);
}

async function requireProjectId(value?: string): Promise<number | null> {
  const input = value ?? await prompt('Project ID: ');
  const id = parseInt(input, 10);
  if (!Number.isSafeInteger(id) || id < 1) {
    console.error('Error: A numeric project ID is required');
    return null;
  }
  return id;
}

async function createProject() {
  console.log('Creating a new project...\n');

  const name = await prompt('Name: ');
  if (!name.trim()) {
    console.error('Error: Name is required');
    return;
  }

  const description = await prompt('Description: ');

  const startsInStr = await prompt('Voting starts in minutes (default: 60): ');
  const startsInMinutes = parseInt(startsInStr, 10) || 60;

  const durationStr = await prompt('Voting duration in minutes (default: 10080): ');
  const durationMinutes = parseInt(durationStr, 10) || 10080;

  console.log('\nCreating project...');

  try {
    const project = await stakevote().createProject({
      name,
      description,
      startTime: Date.now() + startsInMinutes * 60 * 1000,
      durationMs: durationMinutes * 60 * 1000,
    });

    console.log('\nProject created successfully!');
    console.log('-----------------------------');
    console.log(`ID: ${project.id}`);
    console.log(`Name: ${project.name}`);
    console.log(`Voting opens: ${new Date(project.startTime).toISOString()}`);
    console.log(`Voting closes: ${new Date(project.endTime).toISOString()}`);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function castVote(projectIdArg?: string, amountArg?: string, participantArg?: string) {
  const projectId = await requireProjectId(projectIdArg);
  if (projectId === null) return;

  try {
    const amount = parseAmount(amountArg ?? await prompt('Amount: '));
    const participant = participantArg ?? stakevote().identity.publicKey;

    console.log(`\nStaking ${amount} on project ${projectId}...`);
    const outcome = await stakevote().vote({ projectId, participant, amount });

    console.log('\nVote cast successfully!');
    console.log(`Your stake: ${outcome.stake.amount}`);
    console.log(`Project total: ${outcome.totalVotes}`);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function finalizeProject(projectIdArg?: string) {
  const projectId = await requireProjectId(projectIdArg);
  if (projectId === null) return;

  try {
    const project = await stakevote().finalizeProject(projectId);

    console.log('\nProject finalized!');
    console.log(`Winner: ${project.winner ?? 'none'}`);
    console.log(`Total staked: ${project.totalVotes}`);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function unstake(projectIdArg?: string, participantArg?: string) {
  const projectId = await requireProjectId(projectIdArg);
  if (projectId === null) return;

  try {
    const participant = participantArg ?? stakevote().identity.publicKey;
    const receipt = await stakevote().unstakeTokens(projectId, participant);

    console.log('\nStake withdrawn!');
    console.log(`Staked: ${receipt.amount}`);
    console.log(`Paid out: ${receipt.payout}${receipt.isWinner ? ' (winner ★)' : ''}`);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function showStatus(projectIdArg?: string) {
  const projectId = await requireProjectId(projectIdArg);
  if (projectId === null) return;

  try {
    const status = await stakevote().getProjectStatus(projectId);

    console.log('\nProject Status');
    console.log('--------------');
    console.log(`ID: ${status.project.id}`);
    console.log(`Name: ${status.project.name}`);
    console.log(`Status: ${status.status.toUpperCase()}`);
    console.log(`Voters: ${status.voterCount}`);
    console.log(`Total staked: ${status.project.totalVotes}`);
    console.log(`Window: ${new Date(status.project.startTime).toISOString()} - ${new Date(status.project.endTime).toISOString()}`);

    if (status.startsIn > 0) {
      console.log(`Opens in: ${formatDuration(status.startsIn)}`);
    } else if (status.isAcceptingVotes) {
      console.log(`Time Remaining: ${formatDuration(status.timeRemaining)}`);
    }

    if (status.project.isFinalized) {
      console.log(`Winner: ${status.project.winner ?? 'none'}`);
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function listProjects() {
  try {
    const projects = await stakevote().listProjects({ limit: 20 });

    if (projects.length === 0) {
      console.log('No projects found.');
      return;
    }

    console.log('Recent Projects');
    console.log('---------------');
    for (const project of projects) {
      const status = stakevote().projectManager.computeStatus(project);
      console.log(`[${status.toUpperCase()}] #${project.id} ${project.name} - ${project.totalVotes} staked`);
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function showBalance(projectIdArg?: string, participantArg?: string) {
  const projectId = await requireProjectId(projectIdArg);
  if (projectId === null) return;

  try {
    const participant = participantArg ?? stakevote().identity.publicKey;
    const stake = await stakevote().getStake(projectId, participant);
    const unstakeable = await stakevote().getUnstakeableBalance(projectId, participant);

    console.log(`\nParticipant: ${participant.slice(0, 16)}...`);
    console.log(`Staked: ${stake?.amount ?? 0n}`);
    console.log(`Withdrawn: ${stake?.hasUnstaked ? 'yes' : 'no'}`);
    console.log(`Withdrawable now: ${unstakeable}`);
    console.log(`Staked across all projects: ${await stakevote().getTotalStaked(participant)}`);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

async function showEvents(projectIdArg?: string) {
  try {
    const projectId = projectIdArg ? parseInt(projectIdArg, 10) : undefined;
    const events = await stakevote().getEvents({ projectId, limit: 50 });

    for (const event of events) {
      const time = new Date(event.timestamp).toISOString();
      switch (event.type) {
        case 'project-created':
          console.log(`${time} #${event.projectId} created "${event.payload.name}"`);
          break;
        case 'vote-cast':
          console.log(`${time} #${event.projectId} ${event.payload.participant.slice(0, 16)}... staked ${event.payload.amount}`);
          break;
        case 'project-finalized':
          console.log(`${time} #${event.projectId} finalized, winner ${event.payload.winner ?? 'none'}`);
          break;
        case 'tokens-unstaked':
          console.log(`${time} #${event.projectId} ${event.payload.participant.slice(0, 16)}... withdrew ${event.payload.payout}`);
          break;
      }
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
  }
}

function keygen() {
  const keyPair = Crypto.generateKeyPair();
  console.log(`Public key:  ${keyPair.publicKey}`);
  console.log(`Private key: ${keyPair.privateKey}`);
  console.log('\nSet NODE_PRIVATE_KEY to use this identity.');
}

async function healthCheck() {
  console.log('Checking service health...\n');

  const health = await stakevote().healthCheck();

  console.log(`Ledger:   ${health.ledger ? '✓ OK' : '✗ Unavailable'}`);
  console.log(`Identity: ${health.identity.slice(0, 16)}...`);
  console.log(`Admin:    ${health.admin.slice(0, 16)}...`);
  console.log(`\nOverall: ${health.healthy ? '✓ Healthy' : '✗ Unhealthy'}`);
}

function formatDuration(ms: number): string {
  if (ms <= 0) return '0s';

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h ${minutes % 60}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

main().catch(console.error);
