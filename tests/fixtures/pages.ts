/**
 * Tournament API page fixtures
 */

export const pageOne = {
    data: [
        {
            id: '1',
            type: 'tournament',
            attributes: {
                name: '2024 Event',
                url: 'event-2024',
                state: 'complete',
                game_name: 'Flesh and Blood',
                started_at: '2024-03-01T12:00:00Z',
                created_at: '2024-02-01T10:00:00Z',
                participants_count: 16,
                full_challonge_url: 'https://challonge.com/2024-event',
            },
        },
        {
            id: '2',
            type: 'tournament',
            attributes: {
                name: '2023 Event',
                started_at: '2023-01-01T12:00:00Z',
            },
        },
    ],
    links: {
        next: 'https://api.challonge.com/v2/communities/123/tournaments?page=2',
    },
    meta: { current_page: 1, total_pages: 2 },
};

export const pageTwo = {
    data: [
        {
            id: '3',
            type: 'tournament',
            attributes: {
                name: '2024 Event 2',
                started_at: '2024-06-01T12:00:00Z',
            },
            relationships: { participants: { count: 8 } },
        },
    ],
    links: {},
    meta: { current_page: 2, total_pages: 2 },
};

export function jsonResponse(payload: unknown, status = 200): Response {
    return new Response(JSON.stringify(payload), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

export function errorResponse(status: number, body = 'error'): Response {
    return new Response(body, { status });
}
