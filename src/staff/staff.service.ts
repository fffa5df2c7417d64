import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Staff } from './entities/staff.entity';

@Injectable()
export class StaffService {
  constructor(
    @InjectRepository(Staff)
    private readonly staffRepository: Repository<Staff>,
  ) {}

  /** Resolves an active staff member or throws 404. */
  async findActive(id: string): Promise<Staff> {
    const staff = await this.staffRepository.findOne({ where: { id, isActive: true } });
    if (!staff) throw new NotFoundException('Staff member not found');
    return staff;
  }
}
