import { describe, it, expect, beforeEach } from 'vitest';
import { sqlite } from '../../../src/db';
import { VolunteerRepository } from '../../../src/repositories/volunteer.repository';
import { resetDatabase } from '../../helpers/database';

describe('VolunteerRepository', () => {
  const repository = new VolunteerRepository();

  beforeEach(() => {
    resetDatabase();
  });

  async function seedVolunteers(): Promise<void> {
    await repository.create({
      name: 'Casey',
      phone: '555-0101',
      email: 'casey@example.org',
      ministries: [{ category: 'Media', area: 'Sound, etc.' }],
    });
    await repository.create({
      name: 'Avery',
      phone: '555-0102',
      email: 'avery@example.org',
      ministries: [
        { category: 'Hospitality', area: 'Greeters' },
        { category: 'Media', area: 'Social Media' },
        { category: 'Member Care', area: 'Help for Elderly/Widows' },
      ],
    });
    await repository.create({
      name: 'Blake',
      phone: '555-0103',
      email: 'blake@example.org',
      ministries: [],
    });
  }

  it('should store a volunteer with its selections in order', async () => {
    const created = await repository.create({
      name: 'Pat',
      phone: '555-0100',
      email: 'pat@example.org',
      ministries: [
        { category: 'Media', area: 'Sound, etc.' },
        { category: 'Hospitality', area: 'Greeters' },
      ],
    });

    const found = await repository.findById(created.id);

    expect(found?.ministries).toEqual([
      { category: 'Media', area: 'Sound, etc.' },
      { category: 'Hospitality', area: 'Greeters' },
    ]);
  });

  it('should list newest first by default', async () => {
    await seedVolunteers();

    const volunteers = await repository.findAll();

    expect(volunteers.map((v) => v.name)).toEqual(['Blake', 'Avery', 'Casey']);
  });

  it('should sort by name', async () => {
    await seedVolunteers();

    const volunteers = await repository.findAll({ sortBy: 'name' });

    expect(volunteers.map((v) => v.name)).toEqual(['Avery', 'Blake', 'Casey']);
  });

  it('should sort by number of selections', async () => {
    await seedVolunteers();

    const volunteers = await repository.findAll({ sortBy: 'ministry' });

    expect(volunteers.map((v) => v.name)).toEqual(['Avery', 'Casey', 'Blake']);
  });

  it('should filter by ministry area', async () => {
    await seedVolunteers();

    const volunteers = await repository.findAll({ ministryArea: 'Greeters' });

    expect(volunteers.map((v) => v.name)).toEqual(['Avery']);
    // Filtering selects volunteers, not selections
    expect(volunteers[0]?.ministries).toHaveLength(3);
  });

  it('should filter by category', async () => {
    await seedVolunteers();

    const volunteers = await repository.findAll({ category: 'Media', sortBy: 'name' });

    expect(volunteers.map((v) => v.name)).toEqual(['Avery', 'Casey']);
  });

  it('should prefer the ministry area filter over the category filter', async () => {
    await seedVolunteers();

    const volunteers = await repository.findAll({ ministryArea: 'Sound, etc.', category: 'Hospitality' });

    expect(volunteers.map((v) => v.name)).toEqual(['Casey']);
  });

  it('should replace the selection set on update', async () => {
    const created = await repository.create({
      name: 'Pat',
      phone: '555-0100',
      email: 'pat@example.org',
      ministries: [{ category: 'Media', area: 'Sound, etc.' }],
    });

    await repository.replace(created.id, {
      name: 'Pat',
      phone: '555-0100',
      email: 'pat@example.org',
      ministries: [{ category: 'Hospitality', area: 'Kitchen Cleanup' }],
    });

    expect((await repository.findById(created.id))?.ministries).toEqual([
      { category: 'Hospitality', area: 'Kitchen Cleanup' },
    ]);
    expect(sqlite.prepare('SELECT COUNT(*) AS count FROM volunteer_ministries').get()).toEqual({
      count: 1,
    });
  });

  it('should return undefined when replacing an unknown volunteer', async () => {
    const result = await repository.replace(999, {
      name: 'Nobody',
      phone: '555-0000',
      email: 'nobody@example.org',
      ministries: [{ category: 'Media', area: 'Sound, etc.' }],
    });

    expect(result).toBeUndefined();
    expect(sqlite.prepare('SELECT COUNT(*) AS count FROM volunteer_ministries').get()).toEqual({
      count: 0,
    });
  });
});
