import type { MockDestinationOptions, MockSourceProject } from './providers/mock.js';

/** Sample workspace for `demo`: one client project and a personal board sharing a task. */
export function demoSourceProjects(): MockSourceProject[] {
  const shared = {
    id: 'T-100',
    name: 'Homepage mockup review',
    assigneeNames: ['Dana Reyes'],
    creatorName: 'Sam Ortiz',
    categoryLabel: 'Website Homepage Mockup',
    completed: true,
    completedAt: '2024-03-02T16:20:00.000Z',
    createdAt: '2024-02-20T09:00:00.000Z',
    dueOn: '2024-03-01',
    section: 'Website Design',
    isMilestone: false,
    customFields: { 'PM Name': 'Sam Ortiz', 'Actual time': '1.5' },
  };

  return [
    {
      id: 'P-1',
      name: "Dana's tasks",
      tasks: [
        { ...shared },
        {
          id: 'T-200',
          name: 'Update OKR sheet',
          assigneeNames: ['Dana Reyes'],
          categoryLabel: 'OKRs',
          completed: false,
          completedAt: null,
          dueOn: '2024-03-15',
          isMilestone: false,
          customFields: { 'C-Name': 'Internal' },
        },
      ],
    },
    {
      id: 'P-2',
      name: 'Acme Roofing',
      notes: '<p>Website rebuild &amp; launch</p>',
      tasks: [
        {
          id: 'T-300',
          name: 'Kick-off call',
          assigneeNames: ['Sam Ortiz', 'Unknown Contractor'],
          categoryLabel: 'Onboarding | During Client Kick Off Call',
          completed: true,
          completedAt: '2024-02-10T10:00:00.000Z',
          dueOn: '2024-02-10',
          section: 'Onboarding',
          isMilestone: false,
          customFields: { 'PM Name': 'Sam Ortiz', Priority: 'High' },
          comments: [{ id: 'S-1', authorName: 'Sam Ortiz', text: 'Call booked for Tuesday.' }],
        },
        { ...shared },
        {
          id: 'T-400',
          name: 'Go live',
          assigneeNames: [],
          categoryLabel: '',
          completed: false,
          completedAt: null,
          dueOn: '2024-04-01',
          isMilestone: true,
          customFields: {},
        },
        {
          id: 'T-500',
          name: 'Write service page copy',
          assigneeNames: ['Lee Park'],
          categoryLabel: 'Copywriter',
          completed: false,
          completedAt: null,
          startOn: '2024-03-04',
          dueOn: '2024-03-08',
          section: 'Website Design',
          isMilestone: false,
          customFields: { 'Estimated time': '3' },
        },
      ],
    },
  ];
}

export function demoDestination(): MockDestinationOptions {
  return {
    users: [
      { id: 1, firstname: 'Ops', lastname: 'Admin', fullName: 'Ops Admin', isActive: true },
      { id: 2, firstname: 'Sam', lastname: 'Ortiz', fullName: 'Sam Ortiz', email: 'sam@example.com', isActive: true },
      { id: 3, firstname: 'Dana', lastname: 'Reyes', fullName: 'Dana Reyes', isActive: true },
      { id: 4, firstname: 'Lee', lastname: 'Park', fullName: 'Lee Park', isActive: false },
    ],
    activities: [
      { id: 10, name: 'Other', isActive: true },
      { id: 11, name: 'Website - New', isActive: true },
      { id: 12, name: 'Onboarding', isActive: true },
      { id: 13, name: 'Administrative - Internal', isActive: true },
    ],
    companies: [{ id: 50, name: 'Acme Roofing LLC' }],
  };
}

export const DEMO_FALLBACK_USER_ID = 1;
