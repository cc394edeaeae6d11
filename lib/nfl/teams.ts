export const TEAM_NAMES: Record<string, string> = {
	ARI: 'Arizona Cardinals',
	ATL: 'Atlanta Falcons',
	BAL: 'Baltimore Ravens',
	BUF: 'Buffalo Bills',
	CAR: 'Carolina Panthers',
	CHI: 'Chicago Bears',
	CIN: 'Cincinnati Bengals',
	CLE: 'Cleveland Browns',
	DAL: 'Dallas Cowboys',
	DEN: 'Denver Broncos',
	DET: 'Detroit Lions',
	GB: 'Green Bay Packers',
	HOU: 'Houston Texans',
	IND: 'Indianapolis Colts',
	JAX: 'Jacksonville Jaguars',
	KC: 'Kansas City Chiefs',
	LV: 'Las Vegas Raiders',
	LAC: 'Los Angeles Chargers',
	LA: 'Los Angeles Rams',
	MIA: 'Miami Dolphins',
	MIN: 'Minnesota Vikings',
	NE: 'New England Patriots',
	NO: 'New Orleans Saints',
	NYG: 'New York Giants',
	NYJ: 'New York Jets',
	PHI: 'Philadelphia Eagles',
	PIT: 'Pittsburgh Steelers',
	SF: 'San Francisco 49ers',
	SEA: 'Seattle Seahawks',
	TB: 'Tampa Bay Buccaneers',
	TEN: 'Tennessee Titans',
	WAS: 'Washington Commanders',
}

// Older seasons and other feeds still carry these codes
const TEAM_ALIASES: Record<string, string> = {
	OAK: 'LV',
	SD: 'LAC',
	STL: 'LA',
	LAR: 'LA',
	JAC: 'JAX',
	WSH: 'WAS',
}

export function normalizeTeamCode(code: string): string {
	const upper = code.trim().toUpperCase()
	return TEAM_ALIASES[upper] ?? upper
}

export function isKnownTeam(code: string): boolean {
	return normalizeTeamCode(code) in TEAM_NAMES
}

export function teamName(code: string): string {
	const normalized = normalizeTeamCode(code)
	return TEAM_NAMES[normalized] ?? normalized
}

export function matchupLabel(awayTeam: string, homeTeam: string): string {
	return `${normalizeTeamCode(awayTeam)} @ ${normalizeTeamCode(homeTeam)}`
}
